/**
 * Config module - configuration resolution and display
 */

export type { CliFlags, ConfigEnvironment, ResolveConfigOptions } from './resolve-config';
export {
  resolveConfig,
  loadRepoConfig,
  REPO_CONFIG_DIRECTORY,
  REPO_CONFIG_FILE,
} from './resolve-config';

export { formatEffectiveConfigForDisplay } from './format-effective-config';

/**
 * Configuration & Environment
 *
 * Settings from a JSON file and the environment, validated and defaulted.
 */

export {
  Config,
  loadConfig,
  parseConfig,
  getConfig,
  type ConfigInput,
  type ResolvedConfig,
} from './config.ts';

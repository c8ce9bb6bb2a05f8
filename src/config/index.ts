export {
  CONFIG_TEMPLATE_PATH,
  DEFAULT_CONFIG_PATH,
  initConfig,
  loadConfig,
  parseConfigContent
} from './ConfigLoader';
export { validateConfig } from './ConfigValidator';

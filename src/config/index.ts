export { loadConfig, CONFIG_FILE_NAMES } from './loader.js';
export { validateConfig, ConfigValidationError } from './validator.js';
export { DEFAULT_CONFIG, DEFAULT_MODEL_ID, DEFAULT_REGION } from './defaults.js';

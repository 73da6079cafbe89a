export { SPECIALIST_DEFINITIONS } from './specialists.js';
export {
  DEFAULT_CONFIG,
  configTemplate,
  type ConfigDefaults,
  type ConfigTemplateAnswers,
} from './config.js';
export { mkdirSafe, splitCommand } from './utils.js';
export {
  validateProject,
  formatValidation,
  type ValidationCheck,
} from './validation.js';

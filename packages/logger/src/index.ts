export {
  createLoggerOptions,
  developmentTarget,
  type LoggerOptionsInput,
  productionTarget,
  REDACTED_PATHS,
} from './options';

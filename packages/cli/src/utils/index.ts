export {
  dim,
  error,
  header,
  info,
  json,
  keyValue,
  newline,
  success,
  symbols,
  warn,
} from "./output.js";
export { withSpinner } from "./spinner.js";
export {
  EXIT_CONFIG_ERROR,
  EXIT_DATA_ERROR,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  errorLines,
  exitCodeFor,
  formatError,
  handleError,
} from "./errors.js";

export {
  ConfigError,
  ProviderTimeoutError,
  errorMessage,
  isNodeError,
} from "./errors.js";

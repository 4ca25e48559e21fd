export { ConfigurationError, isConfigurationError } from "./ConfigurationError.js";

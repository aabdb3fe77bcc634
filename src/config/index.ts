export { loadRuntimeConfig, ConfigurationError } from "./runtimeConfig";

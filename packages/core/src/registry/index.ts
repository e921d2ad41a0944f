export type { CallbackRegistryOptions, RegistryErrorHandler } from "./CallbackRegistry.js";
export { CallbackRegistry } from "./CallbackRegistry.js";

// Barrel export for config module
export {
  parseServiceNowSettings,
  loadServiceNowSettings,
  type ServiceNowSettings,
  type ConfigOverrides,
  type LoadSettingsOptions,
} from "./loader";
export { CONFIG_DEFINITIONS, DEFAULT_ALLOWED_TABLES, type ConfigKey, type ConfigDefinition } from "./registry";
export { ServiceNowSettingsSchema } from "./schema";

export { AuthConfigSchema, formatIssues, safeValidate, validate } from './schema.js';
export {
  environmentKey,
  fromEnvironment,
  type FromEnvironmentOptions,
} from './from-environment.js';

export {
  LocalEnvironment,
  machineTag,
  unitTag,
} from './local-environment.js';
export { openEnvironment, EnvironmentDocumentError } from './connection.js';
export {
  environmentDocumentSchema,
  type EnvironmentDocument,
  type EnvironmentDocumentInput,
} from './document.js';

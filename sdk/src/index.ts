export { InstrumentationClient } from './client.js';
export {
  InstrumentationAuthError,
  InstrumentationConstraintError,
  InstrumentationError,
  InstrumentationNotFoundError,
  InstrumentationServerError,
  InstrumentationValidationError,
  createInstrumentationError,
  type FieldIssue,
  type InstrumentationErrorCode,
  type InstrumentationErrorContext,
  type NameConflict,
} from './errors.js';
export { DEFAULT_BASE_URL } from './http.js';
export { groupDomains } from './methods/domains.js';
export type * from './types.js';

/**
 * Identifier validation for package, field, message and constant names.
 *
 * @packageDocumentation
 */

export {
  isNamingMode,
  isValidConstantName,
  isValidFieldName,
  isValidMessageName,
  isValidPackageName,
  NAMING_MODES,
  SAMPLE_MESSAGE_PREFIX,
  SERVICE_REQUEST_MESSAGE_SUFFIX,
  SERVICE_RESPONSE_MESSAGE_SUFFIX,
} from './validator.js';
export type { NamingMode } from './validator.js';

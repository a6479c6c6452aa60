/**
 * Domain Value Objects
 */

export { FieldIdentifier, REFERENCE_TYPE_REQUIRED_MESSAGE } from './FieldIdentifier.js';

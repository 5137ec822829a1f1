/**
 * acme-wire - message model exports
 */

// Typed JSON object framework
export {
  TypedJsonObject,
  decodeFields,
} from './json/typed-json-object.js';
export {
  field,
  embedded,
  decodedBy,
  listOf,
  timestamp,
  encodeTimestamp,
  type Decoder,
  type DecoderFactory,
  type FieldSchema,
  type FieldSpec,
  type FieldOptions,
} from './json/field.js';
export { Constant, ConstantRegistry } from './json/constant.js';
export { canonicalize, hashJson, toJsonValue } from './json/canonical.js';
export {
  isJsonSerializable,
  isPlainObject,
  type DecodeOptions,
  type JsonObject,
  type JsonPrimitive,
  type JsonSerializable,
  type JsonValue,
  type UnknownFieldPolicy,
} from './json/types.js';

// Error handling
export {
  JsonObjectError,
  DecodeError,
  EncodeError,
  UnknownAttributeError,
  type JsonObjectErrorType,
} from './json/errors.js';
export {
  ACME_ERROR,
  ERROR_DESCRIPTIONS,
  isAcmeErrorCode,
  type AcmeErrorCode,
  type AcmeErrorType,
} from './errors/codes.js';

// Constants
export * from './constants/status.js';
export * from './constants/defaults.js';

// Challenges
export * from './challenges/challenges.js';

// Messages
export { ErrorMessage, ServerProblemError, type ErrorMessageFields } from './messages/error.js';
export {
  ChallengeBody,
  type ChallengeBodyFields,
  type ChallengeBodyInit,
} from './messages/challenge-body.js';
export * from './messages/authorization.js';
export * from './messages/registration.js';
export * from './messages/revocation.js';
export * from './messages/certificate-request.js';
export * from './messages/resources.js';
export * from './messages/catalog.js';

// Opaque collaborators
export { Jwk } from './crypto/jwk.js';
export { ComparableCertificate, ComparableCsr } from './crypto/der.js';
export { provider } from './crypto/provider.js';

/**
 * Credential validation exports
 */

export {
  CredentialValidator,
  CredentialValidationError,
  type CredentialValidatorDependencies,
  type ValidatedAccount,
} from './credential-validator.js';

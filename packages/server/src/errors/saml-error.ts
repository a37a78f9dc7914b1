import type { ApiErrorResponse } from '@saml-federation/shared';
import {
  type SamlErrorCode,
  type SamlErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_UNKNOWN_PROVIDER,
  ERROR_MISSING_ATTRIBUTE,
  ERROR_PROTOCOL_VALIDATION_FAILED,
  ERROR_POLICY_REJECTED,
  ERROR_ACCOUNT_LINK_CONFLICT,
  ERROR_INVALID_CONFIGURATION,
  ERROR_INVALID_REQUEST,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * Base class of every error raised during a SAML login attempt
 */
export class SamlAuthError extends Error {
  public readonly code: SamlErrorCode;
  public readonly statusCode: SamlErrorStatus;
  public readonly description: string;

  constructor(code: SamlErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'SamlAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): ApiErrorResponse {
    const response: ApiErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    return response;
  }

  static invalidRequest(description?: string): SamlAuthError {
    return new SamlAuthError(ERROR_INVALID_REQUEST, description);
  }

  static serverError(description?: string, cause?: unknown): SamlAuthError {
    return new SamlAuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}

/**
 * The requested provider name is not configured
 */
export class UnknownProviderError extends SamlAuthError {
  public readonly providerName: string;

  constructor(providerName: string) {
    super(
      ERROR_UNKNOWN_PROVIDER,
      providerName ? `Identity provider not found: ${providerName}` : 'Missing identity provider name'
    );
    this.name = 'UnknownProviderError';
    this.providerName = providerName;
  }
}

/**
 * Startup-time misconfiguration
 */
export class InvalidConfigurationError extends SamlAuthError {
  public readonly issues: string[];

  constructor(description: string, issues: string[] = []) {
    super(ERROR_INVALID_CONFIGURATION, description);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/**
 * A required claim is absent from a validated assertion
 */
export class MissingAttributeError extends SamlAuthError {
  public readonly attributeName: string;

  constructor(attributeName: string, providerName: string) {
    super(
      ERROR_MISSING_ATTRIBUTE,
      `Identity provider ${providerName} did not release required attribute ${attributeName}`
    );
    this.name = 'MissingAttributeError';
    this.attributeName = attributeName;
  }
}

/**
 * The SAML engine rejected the response
 */
export class ProtocolValidationError extends SamlAuthError {
  public readonly errors: string[];
  public readonly reason: string | null;

  constructor(errors: string[], reason: string | null) {
    super(
      ERROR_PROTOCOL_VALIDATION_FAILED,
      `SAML login failed: ${errors.length > 0 ? errors.join(', ') : 'not authenticated'}${reason ? ` (${reason})` : ''}`
    );
    this.name = 'ProtocolValidationError';
    this.errors = errors;
    this.reason = reason;
  }
}

/**
 * The post-validation entitlement check vetoed the login
 */
export class PolicyRejectedError extends SamlAuthError {
  constructor(description?: string) {
    super(ERROR_POLICY_REJECTED, description);
    this.name = 'PolicyRejectedError';
  }
}

/**
 * An account link for the same provider identity already exists
 */
export class AccountLinkConflictError extends SamlAuthError {
  public readonly providerName: string;
  public readonly providerUserId: string;

  constructor(providerName: string, providerUserId: string) {
    super(ERROR_ACCOUNT_LINK_CONFLICT);
    this.name = 'AccountLinkConflictError';
    this.providerName = providerName;
    this.providerUserId = providerUserId;
  }
}

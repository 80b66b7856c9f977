/**
 * CredentialValidator
 *
 * Confirms that a credential's cookies are accepted by the API before any
 * bulk work starts.
 */

import { BilibiliApiError } from '../../clients/bilibili/index.js';
import type { BilibiliClient, BilibiliNavInfo } from '../../clients/bilibili/index.js';
import { createServiceLogger, log, toError } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { Credential } from '../../shared/types/index.js';

const NOT_LOGGED_IN_MESSAGE =
  'Credential validation failed: the cookies are not logged in. Update sessdata and bili_jct.';

/**
 * Raised when the credential cannot be confirmed; the run must abort
 */
export class CredentialValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialValidationError';
  }
}

export interface ValidatedAccount {
  uid: number;
  uname: string;
  /** False when the logged-in account is not the configured uid */
  matchesConfiguredUid: boolean;
}

export interface CredentialValidatorDependencies {
  client: BilibiliClient;
}

export class CredentialValidator {
  private readonly client: BilibiliClient;
  private readonly logger: ServiceLogger;

  constructor(dependencies: CredentialValidatorDependencies) {
    this.client = dependencies.client;
    this.logger = createServiceLogger('CredentialValidator');
  }

  /**
   * Fetch the logged-in account for `credential`
   *
   * @throws CredentialValidationError on any failure, with the cause attached
   */
  async validate(credential: Credential): Promise<ValidatedAccount> {
    log.methodEntry(this.logger, 'validate', { uid: credential.uid });

    let info: BilibiliNavInfo;
    try {
      info = await this.client.getSelfInfo();
    } catch (error) {
      log.methodError(this.logger, 'validate', error, { uid: credential.uid });
      const message =
        error instanceof BilibiliApiError && error.isNotLoggedIn
          ? NOT_LOGGED_IN_MESSAGE
          : `Credential validation failed: ${toError(error).message}`;
      throw new CredentialValidationError(message, { cause: error });
    }

    if (!info.isLogin || info.mid === undefined) {
      this.logger.warn({ uid: credential.uid }, 'Credential is not logged in');
      throw new CredentialValidationError(NOT_LOGGED_IN_MESSAGE);
    }

    const account: ValidatedAccount = {
      uid: info.mid,
      uname: info.uname ?? '',
      matchesConfiguredUid: info.mid === credential.uid,
    };

    if (!account.matchesConfiguredUid) {
      this.logger.warn(
        { configuredUid: credential.uid, loggedInUid: info.mid },
        'Logged-in account differs from configured uid'
      );
    }

    log.methodExit(this.logger, 'validate', { uid: account.uid, uname: account.uname });
    return account;
  }
}

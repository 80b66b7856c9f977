/**
 * Pieces shared by both command-line programs
 */

import { BilibiliClient } from '../clients/bilibili/index.js';
import {
  CredentialValidator,
  CredentialValidationError,
} from '../services/credential/index.js';
import type { ValidatedAccount } from '../services/credential/index.js';
import type { Credential } from '../shared/types/index.js';

/**
 * Sink for the human-readable progress lines (stdout by default)
 */
export type PrintFn = (line: string) => void;

export type ClientFactory = (credential: Credential) => BilibiliClient;

export const defaultPrint: PrintFn = (line) => console.log(line);

export const defaultClientFactory: ClientFactory = (credential) => new BilibiliClient(credential);

/**
 * Validate the credential and print the result
 *
 * @returns the account, or null when the run has to abort
 */
export async function confirmCredential(
  client: BilibiliClient,
  credential: Credential,
  print: PrintFn,
  hint: string
): Promise<ValidatedAccount | null> {
  print('Validating credential and fetching account info...');

  let account: ValidatedAccount;
  try {
    account = await new CredentialValidator({ client }).validate(credential);
  } catch (error) {
    if (!(error instanceof CredentialValidationError)) {
      throw error;
    }
    print(error.message);
    print(hint);
    return null;
  }

  print(`Credential valid, logged in as ${account.uname || 'unknown'}.`);
  if (!account.matchesConfiguredUid) {
    print(
      `Warning: logged-in UID ${account.uid} differs from the configured uid ${credential.uid}.`
    );
  }
  return account;
}

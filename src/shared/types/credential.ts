/**
 * Credential Types
 *
 * Cookie-based session credential for the bilibili web API.
 */

/**
 * Config file sections that hold a credential, one per program
 */
export type CredentialSection = 'download_credential' | 'auto_follow_credential';

/**
 * Authenticated session of one bilibili account
 *
 * Loaded once per run from the config file and never written back.
 */
export interface Credential {
  /** `SESSDATA` session cookie */
  readonly sessdata: string;
  /** `bili_jct` cookie, doubles as the CSRF token for write calls */
  readonly biliJct: string;
  /** mid of the account the cookies belong to */
  readonly uid: number;
  /** `buvid3` device cookie (optional) */
  readonly buvid3?: string;
}

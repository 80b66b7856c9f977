/**
 * Credential Config
 *
 * Loads one credential section (`[download_credential]` or
 * `[auto_follow_credential]`) from the config document.
 *
 * Section format:
 * ```toml
 * [auto_follow_credential]
 * sessdata = "..."
 * bili_jct = "..."
 * uid = 123456
 * buvid3 = "..."   # optional
 * ```
 */

import { resolve } from 'path';
import { z } from 'zod';
import { createServiceLogger } from '../logging/index.js';
import type { Credential, CredentialSection } from '../shared/types/index.js';
import { configError, isTable, readConfigDocument } from './config-file.js';
import type { ConfigDocument, ConfigError, ConfigResult } from './config-file.js';

const logger = createServiceLogger('CredentialConfig');

const REQUIRED_FIELDS = ['sessdata', 'bili_jct', 'uid'] as const;

const UID_MESSAGE = 'must be a non-negative integer';

const credentialSectionSchema = z.object({
  sessdata: z.string({ invalid_type_error: 'must be a string' }),
  bili_jct: z.string({ invalid_type_error: 'must be a string' }),
  uid: z.union(
    [
      z.number().int(UID_MESSAGE).nonnegative(UID_MESSAGE),
      z
        .string()
        .trim()
        .regex(/^\d+$/, UID_MESSAGE)
        .transform((value) => Number(value)),
    ],
    { errorMap: () => ({ message: UID_MESSAGE }) }
  ),
  buvid3: z.string({ invalid_type_error: 'must be a string' }).optional(),
});

/**
 * Validate one credential section of an already parsed config document
 */
export function extractCredential(
  document: ConfigDocument,
  section: CredentialSection
): ConfigResult<Credential> {
  const table = document[section];
  if (!isTable(table)) {
    return configError(
      'missing-section',
      `config file has no [${section}] section with sessdata, bili_jct and uid.`
    );
  }

  const missing = REQUIRED_FIELDS.filter((field) => !(field in table));
  if (missing.length > 0) {
    return configError(
      'missing-field',
      `[${section}] is missing required field(s): ${missing.join(', ')}.`
    );
  }

  const parsed = credentialSectionSchema.safeParse(table);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    return configError('invalid-field', `[${section}] has invalid values: ${details}.`);
  }

  const { sessdata, bili_jct: biliJct, uid, buvid3 } = parsed.data;
  if (sessdata.trim() === '' || biliJct.trim() === '' || uid === 0) {
    return configError(
      'empty-field',
      `sessdata, bili_jct and uid in [${section}] must not be empty or 0. Fill in valid values.`
    );
  }

  const credential: Credential = {
    sessdata: sessdata.trim(),
    biliJct: biliJct.trim(),
    uid,
    ...(buvid3 && buvid3.trim() !== '' ? { buvid3: buvid3.trim() } : {}),
  };
  return { ok: true, value: credential };
}

/**
 * Render a config error the way the CLI prints it
 */
export function formatConfigError(error: ConfigError): string {
  return `Error: ${error.message}`;
}

/**
 * Read the config file and return the credential of `section`
 *
 * Prints a diagnostic and returns null on any failure; never throws.
 */
export async function loadCredential(
  path: string,
  section: CredentialSection,
  print: (line: string) => void = console.log
): Promise<Credential | null> {
  const document = await readConfigDocument(path);
  const result = document.ok ? extractCredential(document.value, section) : document;

  if (!result.ok) {
    logger.warn({ path, section, reason: result.error.reason }, 'Credential config rejected');
    print(formatConfigError(result.error));
    return null;
  }

  print(`Loaded configuration from ${resolve(path)}.`);
  return result.value;
}

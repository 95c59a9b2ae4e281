/**
 * IMAP Error Classification
 * Maps imapflow and socket errors onto ImapError kinds.
 */

import { ImapError, errorMessage } from '../errors';
import type { ImapProvider } from '../config';

const AUTH_RESPONSE_CODES = new Set(['AUTHENTICATIONFAILED', 'AUTHORIZATIONFAILED', 'EXPIRED']);
const TRANSIENT_RESPONSE_CODES = new Set(['UNAVAILABLE', 'INUSE', 'LIMIT']);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ETIMEOUT',
  'EPIPE',
  'ECONNABORTED',
  'NoConnection',
  'EConnectionClosed',
]);

const AUTH_WORDING = /authenticat|invalid credentials|auth failed|login failed/i;
const THROTTLE_WORDING = /throttl|too many|rate limit|try again later|temporar/i;
const ALREADY_EXISTS_WORDING = /already exists/i;

export const AUTH_GUIDANCE: Record<ImapProvider, string> = {
  gmail:
    'Gmail accounts with 2-Step Verification need an app password, and IMAP access must be enabled in Gmail settings.',
  custom: 'Check the username and password, and that the account allows IMAP logins.',
};

export interface ClassifyContext {
  provider?: ImapProvider;
  host?: string;
  /** Connect-phase failures other than bad credentials are worth retrying */
  phase?: 'connect' | 'command';
  mailbox?: string;
}

function field(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

function stringField(error: unknown, key: string): string | undefined {
  const value = field(error, key);
  return typeof value === 'string' ? value : undefined;
}

function describe(error: unknown): string {
  return [stringField(error, 'responseText'), errorMessage(error)]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

export function isAuthenticationFailure(error: unknown): boolean {
  if (field(error, 'authenticationFailed') === true) {
    return true;
  }
  const responseCode = stringField(error, 'serverResponseCode');
  if (responseCode && AUTH_RESPONSE_CODES.has(responseCode)) {
    return true;
  }
  return AUTH_WORDING.test(describe(error));
}

export function isAlreadyExists(error: unknown): boolean {
  return (
    stringField(error, 'serverResponseCode') === 'ALREADYEXISTS' ||
    ALREADY_EXISTS_WORDING.test(describe(error))
  );
}

export function isTransientFailure(error: unknown): boolean {
  const code = stringField(error, 'code');
  if (code && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }
  const responseCode = stringField(error, 'serverResponseCode');
  if (responseCode && TRANSIENT_RESPONSE_CODES.has(responseCode)) {
    return true;
  }
  return stringField(error, 'responseStatus') === 'BYE' || THROTTLE_WORDING.test(describe(error));
}

export function classifyImapError(error: unknown, context: ClassifyContext = {}): ImapError {
  if (error instanceof ImapError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(errorMessage(error));
  const details = describe(error) || 'unknown IMAP error';
  const meta = {
    cause,
    host: context.host,
    mailbox: context.mailbox,
    code: stringField(error, 'code'),
    serverResponseCode: stringField(error, 'serverResponseCode'),
  };

  if (isAuthenticationFailure(error)) {
    return ImapError.authenticationFailed(details, AUTH_GUIDANCE[context.provider ?? 'custom'], cause);
  }

  if (context.phase === 'connect' || isTransientFailure(error)) {
    return ImapError.transient(details, meta);
  }

  return ImapError.rejected(details, meta);
}

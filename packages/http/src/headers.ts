import { err, ok, type Result } from 'neverthrow';

export const HeaderNames = {
  accept: 'Accept',
  acceptedLanguage: 'Accept-Language',
  authToken: 'Authorization',
  collectionId: 'Collection-Id',
  downloadServiceToken: 'X-Download-Service-Token',
  eTag: 'ETag',
  ifMatch: 'If-Match',
  localeCode: 'LocaleCode',
  requestId: 'X-Request-Id',
  serviceAuthToken: 'Authorization',
  userAuthToken: 'X-Florence-Token',
  userIdentity: 'User-Identity',
} as const;

export type HeaderName = keyof typeof HeaderNames;

/** If-Match value that matches any ETag */
export const IF_MATCH_ANY_ETAG = '*';

const BEARER_PREFIX = 'Bearer ';

export class HeaderNotFoundError extends Error {
  constructor(public readonly header: string) {
    super(`header not found: ${header}`);
    this.name = 'HeaderNotFoundError';
  }
}

export type HeaderMap = Record<string, string>;

function findHeader(headers: HeaderMap, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

/**
 * Read a header (case-insensitive). Missing or empty values are an error so
 * callers can tell "not sent" apart from a real value.
 */
export function getHeader(headers: HeaderMap, header: HeaderName): Result<string, HeaderNotFoundError> {
  const name = HeaderNames[header];
  const value = findHeader(headers, name);
  if (value === undefined || value === '') {
    return err(new HeaderNotFoundError(name));
  }
  if (header === 'serviceAuthToken' || header === 'authToken') {
    return ok(value.startsWith(BEARER_PREFIX) ? value.slice(BEARER_PREFIX.length) : value);
  }
  return ok(value);
}

/**
 * Return a copy of `headers` with `header` set. Empty values leave the headers unchanged.
 * Tokens sent in Authorization get the Bearer prefix when they lack it.
 */
export function withHeader(headers: HeaderMap, header: HeaderName, value: string | undefined): HeaderMap {
  if (!value) {
    return headers;
  }

  const name = HeaderNames[header];
  const needsBearer = header === 'serviceAuthToken' || header === 'authToken';
  return {
    ...headers,
    [name]: needsBearer && !value.startsWith(BEARER_PREFIX) ? `${BEARER_PREFIX}${value}` : value,
  };
}

export interface RequestAuth {
  collectionId?: string | undefined;
  requestId?: string | undefined;
  serviceAuthToken?: string | undefined;
  userAuthToken?: string | undefined;
  downloadServiceToken?: string | undefined;
}

/**
 * Build the auth and tracing headers common to downstream API calls
 */
export function authHeaders(auth: RequestAuth): HeaderMap {
  let headers: HeaderMap = {};
  headers = withHeader(headers, 'serviceAuthToken', auth.serviceAuthToken);
  headers = withHeader(headers, 'userAuthToken', auth.userAuthToken);
  headers = withHeader(headers, 'downloadServiceToken', auth.downloadServiceToken);
  headers = withHeader(headers, 'collectionId', auth.collectionId);
  headers = withHeader(headers, 'requestId', auth.requestId);
  return headers;
}

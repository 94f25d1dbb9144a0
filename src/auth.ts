export interface BasicAuthCredentials {
  username: string;
  password: string;
}

const BASIC_PREFIX = 'Basic ';

/** Standard alphabet, padded, nothing else */
const BASE64_PAYLOAD = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode an `Authorization: Basic` header into a username/password pair.
 *
 * Returns `undefined` for a missing header, another scheme, a payload that is
 * not strict padded base64, or one without a colon. The password is
 * everything after the first colon.
 */
export function parseBasicAuth(
  header: string | undefined
): BasicAuthCredentials | undefined {
  if (!header || !header.startsWith(BASIC_PREFIX)) {
    return undefined;
  }

  const payload = header.slice(BASIC_PREFIX.length);
  if (payload.length % 4 !== 0 || !BASE64_PAYLOAD.test(payload)) {
    return undefined;
  }

  const decoded = Buffer.from(payload, 'base64').toString('utf8');

  const separator = decoded.indexOf(':');
  if (separator === -1) {
    return undefined;
  }

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

/** Exact match of the presented credentials against the configured pair */
export function checkBasicAuth(
  header: string | undefined,
  expected: BasicAuthCredentials
): boolean {
  const presented = parseBasicAuth(header);
  return (
    presented !== undefined &&
    presented.username === expected.username &&
    presented.password === expected.password
  );
}

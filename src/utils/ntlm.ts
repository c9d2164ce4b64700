import httpntlm from 'httpntlm';

export interface NtlmCredentials {
  username: string;
  password: string;
  domain: string;
  workstation: string;
}

/**
 * Authorization header opening the NTLM handshake
 */
export function createNegotiateHeader(credentials: NtlmCredentials): string {
  return httpntlm.ntlm.createType1Message(credentials);
}

/**
 * Pull the NTLM challenge out of a `www-authenticate` header value.
 * Returns null when the server offered no NTLM challenge.
 */
export function findChallenge(header: string | string[] | undefined): string | null {
  if (header === undefined) return null;

  const values = Array.isArray(header) ? header : header.split(',');
  for (const value of values) {
    const trimmed = value.trim();
    if (/^NTLM \S+/.test(trimmed)) {
      return trimmed;
    }
  }
  return null;
}

/**
 * Authorization header answering the server's challenge
 */
export function createAuthenticateHeader(challenge: string, credentials: NtlmCredentials): string {
  const errors: Error[] = [];
  const type2 = httpntlm.ntlm.parseType2Message(challenge, (error) => {
    errors.push(error);
  });

  if (!type2) {
    throw errors[0] ?? new Error('Malformed NTLM challenge');
  }

  return httpntlm.ntlm.createType3Message(type2, credentials);
}

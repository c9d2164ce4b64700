// httpntlm ships no type declarations; this covers the NTLM message helpers it exports.
declare module 'httpntlm' {
  interface NtlmMessageOptions {
    username: string;
    password: string;
    domain: string;
    workstation: string;
  }

  interface Type2Message {
    signature: Buffer;
    type: number;
    negotiateFlags: number;
    serverChallenge: Buffer;
    targetInfo?: unknown;
  }

  interface NtlmHelpers {
    createType1Message(options: NtlmMessageOptions): string;
    parseType2Message(rawmsg: string, callback: (error: Error) => void): Type2Message | null;
    createType3Message(type2: Type2Message, options: NtlmMessageOptions): string;
  }

  const httpntlm: {
    ntlm: NtlmHelpers;
  };

  export = httpntlm;
}

/**
 * Recovery/rotation key generation. The private half is handed back as hex
 * for sealing; only the did:key form is ever logged or shown.
 */

import { Secp256k1Keypair } from "@atproto/crypto";

export interface RotationKey {
  /** Public key as a did:key, the form the identity directory lists. */
  did: string;
  privateKeyHex: string;
}

export interface RotationKeyGenerator {
  generate(): Promise<RotationKey>;
}

export function createSecp256k1KeyGenerator(): RotationKeyGenerator {
  return {
    async generate() {
      const keypair = await Secp256k1Keypair.create({ exportable: true });
      const privateKey = await keypair.export();
      return { did: keypair.did(), privateKeyHex: Buffer.from(privateKey).toString("hex") };
    },
  };
}

/** did:key of a previously exported private key. */
export async function rotationKeyDid(privateKeyHex: string): Promise<string> {
  const keypair = await Secp256k1Keypair.import(privateKeyHex);
  return keypair.did();
}

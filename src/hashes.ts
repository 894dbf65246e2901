import { sha1 as nobleSha1 } from "@noble/hashes/sha1";
import { sha256 as nobleSha256 } from "@noble/hashes/sha256";
import { ripemd160 as nobleRipemd160 } from "@noble/hashes/ripemd160";
import { base58check } from "@scure/base";
import { Bytes } from "./bytes";

export const sha1 = (message: Bytes): Bytes => nobleSha1(message);

export const sha256 = (message: Bytes): Bytes => nobleSha256(message);

export const ripemd160 = (message: Bytes): Bytes => nobleRipemd160(message);

export const hash160 = (buffer: Bytes) => ripemd160(sha256(buffer));

export const hash256 = (buffer: Bytes) => sha256(sha256(buffer));

export const bs58check = base58check(nobleSha256);

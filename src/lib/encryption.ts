import CryptoJS from "crypto-js";

export function encrypt(plaintext: string, key: string): string {
  return CryptoJS.AES.encrypt(plaintext, key).toString();
}

export function decrypt(ciphertext: string, key: string): string {
  const bytes = CryptoJS.AES.decrypt(ciphertext, key);
  return bytes.toString(CryptoJS.enc.Utf8);
}

export function encryptJson(data: Record<string, unknown>, key: string): string {
  return encrypt(JSON.stringify(data), key);
}

export function decryptJson(ciphertext: string, key: string): unknown {
  let json = "";
  try {
    json = decrypt(ciphertext, key);
  } catch {
    // Malformed UTF-8 from a wrong key surfaces as a throw
    json = "";
  }
  if (!json) throw new Error("Failed to decrypt token file");
  return JSON.parse(json);
}

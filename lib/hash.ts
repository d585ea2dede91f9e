import crypto from "node:crypto";

export function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

/** Short digest printed next to every written table. */
export function tableDigest(text: string): string {
  return sha256(text).slice(0, 12);
}

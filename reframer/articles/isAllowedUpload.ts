export const ALLOWED_UPLOAD_EXTENSIONS = ["pdf", "txt"] as const;
export type UploadExtension = (typeof ALLOWED_UPLOAD_EXTENSIONS)[number];

export function uploadExtension(filename: string): UploadExtension | null {
  const idx = filename.lastIndexOf(".");
  if (idx === -1) return null;
  const ext = filename.slice(idx + 1).toLowerCase();
  return ALLOWED_UPLOAD_EXTENSIONS.find((allowed) => allowed === ext) ?? null;
}

export function isAllowedUpload(filename: string): boolean {
  return uploadExtension(filename) !== null;
}

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // "%PDF-"

export function looksLikePdf(bytes: Uint8Array): boolean {
  return bytes.length >= PDF_MAGIC.length && PDF_MAGIC.every((b, i) => bytes[i] === b);
}

export type ArchiveType = "zip" | "rar" | "7z";

const MAGIC_BYTES: Record<ArchiveType, number[]> = {
  zip: [0x50, 0x4b, 0x03, 0x04],
  rar: [0x52, 0x61, 0x72, 0x21],
  "7z": [0x37, 0x7a, 0xbc, 0xaf],
};

export function detectArchiveType(header: Uint8Array): ArchiveType | null {
  for (const [type, magic] of Object.entries(MAGIC_BYTES)) {
    if (magic.every((byte, i) => header[i] === byte)) {
      return isArchiveType(type) ? type : null;
    }
  }
  return null;
}

function isArchiveType(value: string): value is ArchiveType {
  return value === "zip" || value === "rar" || value === "7z";
}

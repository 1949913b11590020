import { DecodeError } from "../utils/errors";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Split an upload of the form "<mime-prefix>,<base64-payload>" and decode the payload
 * @param contents Data-URL string produced by the browser's FileReader
 * @returns Decoded file bytes
 */
export function decodeUpload(contents: string): Buffer {
  const parts = contents.split(",");
  if (parts.length !== 2) {
    throw new DecodeError(
      "Upload must have the form '<mime-prefix>,<base64-payload>'"
    );
  }

  const payload = parts[1].replace(/\s+/g, "");
  if (payload.length === 0) {
    throw new DecodeError("Upload payload is empty");
  }

  if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
    throw new DecodeError("Upload payload is not valid base64");
  }

  return Buffer.from(payload, "base64");
}

/**
 * Wrap file bytes in the same data-URL form the browser uploads
 */
export function encodeUpload(
  bytes: Buffer,
  mimeType = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
): string {
  return `data:${mimeType};base64,${bytes.toString("base64")}`;
}

import * as path from "path";
import * as fsPromises from "fs/promises";

/**
 * Reads a file and returns its raw bytes
 * @param filePath Path to the file, relative to the working directory or absolute
 */
export async function readBinaryFile(filePath: string): Promise<Buffer> {
  return fsPromises.readFile(path.resolve(process.cwd(), filePath));
}

/**
 * Checks if a file exists
 * @param filePath Path to the file
 * @returns True if the file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  return fsPromises
    .access(path.resolve(process.cwd(), filePath))
    .then(() => true)
    .catch(() => false);
}

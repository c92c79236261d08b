import * as fs from "fs";
import * as path from "path";

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export async function readTextFileAsync(filePath: string, encoding?: BufferEncoding): Promise<string> {
  return fs.promises.readFile(filePath, encoding || "utf-8");
}

export async function readBinaryFileAsync(filePath: string): Promise<Uint8Array> {
  const data = await fs.promises.readFile(filePath);
  return new Uint8Array(data);
}

export async function writeTextFile(filePath: string, content: string, encoding?: BufferEncoding): Promise<void> {
  ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, { encoding: encoding || "utf-8" });
}

export async function writeBinaryFile(filePath: string, data: Uint8Array): Promise<void> {
  ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, Buffer.from(data));
}

// "out/sprite.raw" + ".json" => "out/sprite.json"
export function replaceExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

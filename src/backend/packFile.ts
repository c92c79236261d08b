import Ajv from "ajv";

import packFileSchema from "../../schemas/packfile.schema.json";

import { AssembledFrame, EncodedFragment } from "./fragmentAssembler";

// The json written next to an encoded payload: enough to rebuild the frame from the payload bytes.
// This is wanpack's own interchange file, not a WAN container.
export interface PackFile {
  version: 1;
  // payload file name, relative to the json file
  payload: string;
  strategy: string;
  frame: AssembledFrame;
  fragments: EncodedFragment[];
}

export class PackFileError extends Error {
  constructor(
    message: string,
    public errors: unknown[] = [],
  ) {
    super(message);
    this.name = "PackFileError";
  }
}

const ajv = new Ajv({ allErrors: true });
const validatePackFile = ajv.compile<PackFile>(packFileSchema);

export function serializePackFile(pack: PackFile): string {
  return `${JSON.stringify(pack, null, 2)}\n`;
}

export function parsePackFile(text: string): PackFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new PackFileError(`Pack file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!validatePackFile(parsed)) {
    const errors = validatePackFile.errors ?? [];
    const messages = errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
    throw new PackFileError(`Pack file validation failed:\n${messages.join("\n")}`, errors);
  }
  return parsed;
}

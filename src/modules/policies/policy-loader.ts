import fs from "node:fs/promises";
import path from "node:path";
import { chunkPolicyDocument } from "./chunker.js";
import type { Chunk, ClauseCategoryRules, PolicyDocumentSource, PolicyType } from "./types.js";

export class PolicyDocumentError extends Error {
  readonly documentId: string;

  constructor(documentId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PolicyDocumentError";
    this.documentId = documentId;
  }
}

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export interface FileSystemPolicySourceOptions {
  directory: string;
  readFile?: (filePath: string, encoding: "utf8") => Promise<string>;
}

/**
 * Reads policy documents from a single directory. Identifiers are file names
 * relative to that directory; anything resolving outside it is rejected.
 */
export class FileSystemPolicySource implements PolicyDocumentSource {
  private readonly root: string;
  private readonly readFile: (filePath: string, encoding: "utf8") => Promise<string>;

  constructor(options: FileSystemPolicySourceOptions) {
    this.root = path.resolve(process.cwd(), options.directory);
    this.readFile = options.readFile ?? ((filePath, encoding) => fs.readFile(filePath, encoding));
  }

  resolvePath(documentId: string): string {
    const trimmed = documentId.trim();
    if (trimmed.length === 0) {
      throw new PolicyDocumentError(documentId, "Policy document identifier is empty.");
    }
    const resolved = path.resolve(this.root, trimmed);
    const relative = path.relative(this.root, resolved);
    if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new PolicyDocumentError(documentId, `Policy document "${documentId}" is outside the policies directory.`);
    }
    return resolved;
  }

  async read(documentId: string): Promise<string> {
    const filePath = this.resolvePath(documentId);
    try {
      return await this.readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new PolicyDocumentError(documentId, `Policy document "${documentId}" was not found.`, { cause: error });
      }
      throw new PolicyDocumentError(documentId, `Policy document "${documentId}" could not be read.`, { cause: error });
    }
  }
}

export interface LoadPolicyChunksInput {
  documentId: string;
  policyType?: PolicyType;
  rules?: ClauseCategoryRules;
}

export const loadPolicyChunks = async (
  source: PolicyDocumentSource,
  input: LoadPolicyChunksInput
): Promise<Chunk[]> => {
  const text = await source.read(input.documentId);
  const chunks = chunkPolicyDocument(text, {
    sourceDocument: input.documentId,
    policyType: input.policyType,
    rules: input.rules
  });
  if (chunks.length === 0) {
    throw new PolicyDocumentError(input.documentId, `Policy document "${input.documentId}" is empty.`);
  }
  return chunks;
};

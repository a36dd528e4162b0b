import { z } from "zod";

/** Library names end up in paths and toolchain config; keep shell metacharacters out */
export const LIBRARY_NAME_PATTERN = /^[a-zA-Z0-9_ ]+$/;
export const LIBRARY_VERSION_PATTERN = /^[0-9A-Za-z.+-]+$/;

export const LibraryRequestSchema = z.object({
  name: z.string().trim().regex(LIBRARY_NAME_PATTERN, "library name may only contain letters, digits, '_' and ' '"),
  version: z.string().regex(LIBRARY_VERSION_PATTERN, "invalid library version").optional(),
});

export type LibraryRequest = z.infer<typeof LibraryRequestSchema>;

/** Wire form of a library: "Name" or "Name@1.2.3" */
export const LibrarySpecSchema = z
  .string()
  .transform((spec) => {
    const at = spec.indexOf("@");
    return at === -1
      ? { name: spec.trim() }
      : { name: spec.slice(0, at).trim(), version: spec.slice(at + 1).trim() };
  })
  .pipe(LibraryRequestSchema);

export const CompileRequestSchema = z.object({
  sourceCode: z.string(),
  board: z.string().min(1),
  libraries: z.array(LibrarySpecSchema).default([]),
});

export type CompileRequest = z.input<typeof CompileRequestSchema>;

export type FirmwareEncoding = "hex" | "uf2" | "bin";

export interface CompileJob {
  sourceCode: string;
  board: string;
  libraries: LibraryRequest[];
}

export interface FirmwareImage {
  /** Hex text as-is; uf2/bin base64 encoded */
  firmware: string;
  encoding: FirmwareEncoding;
}

/** Response shape handed to the HTTP layer */
export type CompileResponse = { hex: string } | { sketch: string };

export function toCompileResponse(image: FirmwareImage): CompileResponse {
  return image.encoding === "hex" ? { hex: image.firmware } : { sketch: image.firmware };
}

import { z } from "zod";

export const BoardSchema = z.object({
  /** Board identifier used in compile requests, e.g. "arduino:avr:uno" */
  fqbn: z.string().regex(/^[a-z0-9_]+:[a-z0-9_]+:[a-z0-9_]+$/i),
  /** PlatformIO board id, also used as the environment and manifest key */
  env: z.string().regex(/^[A-Za-z0-9_]+$/),
  platform: z.string(),
  framework: z.string().default("arduino"),
});

export const DEFAULT_BOARDS: z.input<typeof BoardSchema>[] = [
  { fqbn: "arduino:avr:uno", env: "uno", platform: "atmelavr" },
  { fqbn: "arduino:avr:nano", env: "nanoatmega328", platform: "atmelavr" },
  { fqbn: "arduino:avr:mega", env: "megaatmega2560", platform: "atmelavr" },
  { fqbn: "arduino:esp32:nano_nora", env: "arduino_nano_esp32", platform: "espressif32" },
  { fqbn: "arduino:mbed_rp2040:pico", env: "pico", platform: "raspberrypi" },
];

export const StorageSchema = z.object({
  data_dir: z.string().default(".firmforge/data"),
  libraries_subdir: z.string().default("libraries"),
  slots_subdir: z.string().default("slots"),
});

export const PoolSchema = z.object({
  max_concurrent_compiles: z.number().int().positive().default(10),
});

export const ToolchainSchema = z.object({
  command: z.string().default("platformio"),
  threads_per_compile: z.number().int().positive().default(1),
  compile_timeout_sec: z.number().int().positive().default(300),
  library_timeout_sec: z.number().int().positive().default(600),
});

export const CatalogConfigSchema = z.object({
  index_url: z.string().url().default("https://downloads.arduino.cc/libraries/library_index.json"),
  /** 0 disables both the startup fetch and periodic refresh */
  refresh_interval_sec: z.number().int().nonnegative().default(3600),
  fetch_timeout_ms: z.number().int().positive().default(60000),
});

export const NetworkSchema = z.object({
  connectivity_url: z.string().url().default("https://downloads.arduino.cc"),
  connectivity_timeout_ms: z.number().int().positive().default(3000),
  download_timeout_ms: z.number().int().positive().default(60000),
});

export const CacheSchema = z.object({
  library_ttl_sec: z.number().int().positive().default(24 * 3600),
  max_libraries: z.number().int().positive().default(50),
  code_ttl_sec: z.number().int().positive().default(3600),
  max_code_entries: z.number().int().positive().default(100),
});

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  color: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  version: z.string().default("1.0"),
  storage: StorageSchema.default({}),
  pool: PoolSchema.default({}),
  toolchain: ToolchainSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
  network: NetworkSchema.default({}),
  cache: CacheSchema.default({}),
  logging: LoggingSchema.default({}),
  boards: z
    .array(BoardSchema)
    .min(1)
    .default(DEFAULT_BOARDS)
    .refine((boards) => new Set(boards.map((b) => b.env)).size === boards.length, {
      message: "board env names must be unique",
    }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type BoardConfig = z.infer<typeof BoardSchema>;
export type ToolchainConfig = z.infer<typeof ToolchainSchema>;

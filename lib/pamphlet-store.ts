import { randomUUID } from "crypto";
import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";

export const PAMPHLET_FILE_PREFIXES = ["pamphlet", "edited"] as const;
export type PamphletFilePrefix = (typeof PAMPHLET_FILE_PREFIXES)[number];

const FILENAME_PATTERN = /^(pamphlet|edited)_[a-z0-9-]{1,48}_[a-f0-9]{8}\.png$/;
const DEFAULT_NAME_SLUG = "untitled";
const MAX_SAVE_ATTEMPTS = 5;

export type StoreOptions = {
  directory?: string;
  createToken?: () => string;
};

function randomToken(): string {
  return randomUUID().slice(0, 8);
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function resolveOutputDirectory(options: StoreOptions = {}): string {
  if (options.directory) {
    return options.directory;
  }

  const configured = process.env.PAMPHLET_OUTPUT_DIR?.trim();
  return configured ? path.resolve(configured) : path.join(process.cwd(), "public", "pamphlets");
}

export function sanitizeProductName(productName: string): string {
  const slug = productName
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 48)
    .replace(/-+$/g, "");

  return slug || DEFAULT_NAME_SLUG;
}

export function buildPamphletFilename(prefix: PamphletFilePrefix, productName: string, token = randomToken()): string {
  return `${prefix}_${sanitizeProductName(productName)}_${token}.png`;
}

export function isPamphletFilename(filename: string): boolean {
  return FILENAME_PATTERN.test(filename);
}

export async function savePamphletImage(
  png: Buffer,
  params: { prefix: PamphletFilePrefix; productName: string },
  options: StoreOptions = {}
): Promise<string> {
  const directory = resolveOutputDirectory(options);
  await mkdir(directory, { recursive: true });

  const createToken = options.createToken ?? randomToken;

  // Tokens are short, so a name can already be taken; draw a new one instead of overwriting.
  for (let attempt = 1; ; attempt += 1) {
    const filename = buildPamphletFilename(params.prefix, params.productName, createToken());
    try {
      await writeFile(path.join(directory, filename), png, { flag: "wx" });
      console.info(`[pamphlet-store] saved ${filename}`);
      return filename;
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST") || attempt >= MAX_SAVE_ATTEMPTS) {
        throw error;
      }
      console.warn(`[pamphlet-store] ${filename} already exists, retrying with a new token`);
    }
  }
}

// Returns null for unknown or malformed names so callers can answer 404.
export async function readPamphletImage(filename: string, options: StoreOptions = {}): Promise<Buffer | null> {
  if (!isPamphletFilename(filename)) {
    return null;
  }

  try {
    return await readFile(path.join(resolveOutputDirectory(options), filename));
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

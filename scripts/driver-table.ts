#!/usr/bin/env tsx

/**
 * Build the kernel version / driver support matrix by scanning the EtherCAT
 * device driver sources for `<prefix>-<major>.<minor>-ethercat.c` files.
 */

import {
  existsSync,
  readdirSync,
  realpathSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

export type DriverEntry = {
  readonly subdir: string;
  readonly driverName: string;
  readonly filePrefix: string;
};

export type KernelVersion = {
  readonly major: number;
  readonly minor: number;
};

type VersionBucket = {
  version: KernelVersion;
  drivers: Set<string>;
};

// Keyed as `${major}.${minor}`
export type VersionDriverMap = Map<string, VersionBucket>;

export type Table = string[][];

export const ROOT_SUBDIR = ".";
export const SOURCE_EXTENSION = "c";

export const DRIVER_MAP: readonly DriverEntry[] = [
  { subdir: ".", driverName: "8139too", filePrefix: "8139too" },
  { subdir: "stmmac", driverName: "dwmac-intel", filePrefix: "dwmac-intel" },
  { subdir: ".", driverName: "e100", filePrefix: "e100" },
  { subdir: "e1000", driverName: "e1000", filePrefix: "e1000_main" },
  { subdir: "e1000e", driverName: "e1000e", filePrefix: "netdev" },
  { subdir: "genet", driverName: "bcmgenet", filePrefix: "bcmgenet" },
  { subdir: "igb", driverName: "igb", filePrefix: "igb_main" },
  { subdir: "igc", driverName: "igc", filePrefix: "igc_main" },
  { subdir: ".", driverName: "r8169", filePrefix: "r8169" },
  { subdir: "r8169", driverName: "r8169", filePrefix: "r8169_main" },
  { subdir: "stmmac", driverName: "stmmac-pci", filePrefix: "stmmac_pci" },
];

export function driverNames(catalog: readonly DriverEntry[]): string[] {
  const names = new Set(catalog.map((entry) => entry.driverName));
  // Plain code-unit order, not locale order
  return [...names].sort();
}

export const DRIVERS: readonly string[] = driverNames(DRIVER_MAP);

export const USAGE =
  "Usage: driver-table [-h] [--markdown <path>] <devices_dir>\n\n" +
  "Arguments:\n" +
  "  devices_dir        Devices driver source dir\n\n" +
  "Options:\n" +
  "  --markdown <path>  Markdown output file, - for standard output\n" +
  "  -h, --help         Show this help message";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function compileVersionPattern(
  prefix: string,
  extension: string,
): RegExp {
  return new RegExp(
    `^${escapeRegExp(prefix)}-(\\d+)\\.(\\d+)-ethercat\\.${escapeRegExp(extension)}$`,
  );
}

export function versionKey(version: KernelVersion): string {
  return `${version.major}.${version.minor}`;
}

export function filterVersions(
  files: Iterable<string>,
  prefix: string,
  extension: string,
): KernelVersion[] {
  const pattern = compileVersionPattern(prefix, extension);
  const found = new Map<string, KernelVersion>();
  for (const file of files) {
    const match = pattern.exec(file);
    if (!match) continue;
    const version = {
      major: Number.parseInt(match[1], 10),
      minor: Number.parseInt(match[2], 10),
    };
    // Digit runs past 2^53 would not print back as written
    if (!Number.isSafeInteger(version.major)) continue;
    if (!Number.isSafeInteger(version.minor)) continue;
    found.set(versionKey(version), version);
  }
  return [...found.values()];
}

// Dangling and looping links count as files.
function linksToDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Names of the non-directory entries directly inside `dir`. Throws when the
 * directory cannot be read.
 */
export function listFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) continue;
    if (entry.isSymbolicLink() && linksToDirectory(join(dir, entry.name))) {
      continue;
    }
    files.push(entry.name);
  }
  return files;
}

function ensureBucket(
  map: VersionDriverMap,
  version: KernelVersion,
): Set<string> {
  const key = versionKey(version);
  let bucket = map.get(key);
  if (!bucket) {
    bucket = { version, drivers: new Set<string>() };
    map.set(key, bucket);
  }
  return bucket.drivers;
}

export function collectDriverVersions(
  devicesDir: string,
  catalog: readonly DriverEntry[] = DRIVER_MAP,
): VersionDriverMap {
  const table: VersionDriverMap = new Map();
  for (const entry of catalog) {
    const dir =
      entry.subdir === ROOT_SUBDIR ? devicesDir : join(devicesDir, entry.subdir);
    const versions = filterVersions(
      listFiles(dir),
      entry.filePrefix,
      SOURCE_EXTENSION,
    );
    for (const version of versions) {
      ensureBucket(table, version).add(entry.driverName);
    }
  }
  return table;
}

export function compareVersionsDescending(
  a: KernelVersion,
  b: KernelVersion,
): number {
  if (a.major !== b.major) return b.major - a.major;
  return b.minor - a.minor;
}

export function formatVersionLabel(version: KernelVersion): string {
  return `${version.major}.${String(version.minor).padEnd(2)}`;
}

export function computeTable(
  versions: VersionDriverMap,
  drivers: readonly string[] = DRIVERS,
): Table {
  const rows: Table = [["Kernel", ...drivers]];
  const buckets = [...versions.values()].sort((a, b) =>
    compareVersionsDescending(a.version, b.version),
  );
  for (const { version, drivers: present } of buckets) {
    rows.push([
      formatVersionLabel(version),
      ...drivers.map((driver) => (present.has(driver) ? "X" : "-")),
    ]);
  }
  return rows;
}

export function maxCellWidth(row: readonly string[]): number {
  let width = 0;
  for (const cell of row) {
    if (cell.length > width) width = cell.length;
  }
  return width;
}

function alignCenter(cell: string, width: number): string {
  const padding = Math.max(width - cell.length, 0);
  const left = Math.floor(padding / 2);
  return " ".repeat(left) + cell + " ".repeat(padding - left);
}

/**
 * Render the table as markdown. Every column is as wide as the widest header
 * cell; longer data cells are kept whole and push their column out of line.
 */
export function renderMarkdown(table: Table): string {
  const [header, ...rows] = table;
  if (!header || header.length === 0) return "";
  const width = maxCellWidth(header);
  const [caption, ...columns] = header;

  let headerLine = `| ${caption.padEnd(width)} `;
  for (const cell of columns) {
    headerLine += `| ${alignCenter(cell, width)} `;
  }
  headerLine += "|";

  let separator = `|-${"-".repeat(width)}:|`;
  for (let i = 0; i < columns.length; i++) {
    separator += `:${"-".repeat(width)}:|`;
  }

  const lines = [headerLine, separator];
  for (const [label = "", ...cells] of rows) {
    let line = `| ${label.padStart(width)} `;
    for (const cell of cells) {
      line += `| ${alignCenter(cell, width)} `;
    }
    lines.push(`${line}|`);
  }
  return lines.join("\n");
}

export function writeMarkdown(table: Table, outputPath: string): void {
  writeFileSync(outputPath, `${renderMarkdown(table)}\n`, "utf8");
}

export const STDOUT_PATH = "-";

export type DriverTableOptions = {
  devicesDir: string;
  markdownPath: string | null;
  help: boolean;
};

export function parseArgs(argv: string[]): DriverTableOptions {
  let markdownPath: string | null = null;
  let help = false;
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      help = true;
    } else if (arg === "--markdown") {
      const value = argv[i + 1];
      if (value === undefined || (value.startsWith("-") && value !== "-")) {
        throw new UsageError("argument --markdown: expected one argument");
      }
      markdownPath = value;
      i++;
    } else if (arg.startsWith("--markdown=")) {
      markdownPath = arg.slice("--markdown=".length);
      if (!markdownPath) {
        throw new UsageError("argument --markdown: expected one argument");
      }
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`unrecognized arguments: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (help) return { devicesDir: "", markdownPath, help };
  if (positionals.length === 0) {
    throw new UsageError("the following arguments are required: devices_dir");
  }
  if (positionals.length > 1) {
    throw new UsageError(
      `unrecognized arguments: ${positionals.slice(1).join(" ")}`,
    );
  }
  return { devicesDir: positionals[0], markdownPath, help };
}

export function main(argv: string[] = process.argv.slice(2)): number {
  let options: DriverTableOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`Error: ${error.message}`);
    console.error(USAGE);
    return 2;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const table = computeTable(collectDriverVersions(options.devicesDir));

  const { markdownPath } = options;
  if (markdownPath !== null && markdownPath !== STDOUT_PATH) {
    writeMarkdown(table, markdownPath);
    console.log(`Driver table written to ${markdownPath}`);
    return 0;
  }

  console.log(renderMarkdown(table));
  return 0;
}

/**
 * Whether `scriptPath` (normally `process.argv[1]`) is this module, also when
 * it is reached through a symlink such as an npm bin link.
 */
export function isEntryPoint(
  scriptPath: string | undefined,
  moduleUrl: string,
): boolean {
  if (!scriptPath || !existsSync(scriptPath)) return false;
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  process.exit(main());
}

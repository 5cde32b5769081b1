import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import {
  captureBookmark,
  createLogger,
  createViewportTransition,
  eulerDegreesFromQuaternion,
  hotkeyIndex,
  indexOutOfRange,
  jumpToBookmark,
  length,
  nearestLookTarget,
  normalize,
  parseSnapshot,
  poseFromRecord,
  quaternionFromEulerDegrees,
  recordFromPose,
  serializeSnapshot,
  succeed,
  type BookmarkPreferences,
  type BookmarkRecord,
  type BookmarkResult,
  type BookmarkStore,
  type Logger,
  type Pose,
  type Rgba,
  type Vec3,
} from "@viewmark/engine";
import { parseCliConfig, renderHelpText } from "./config.js";
import { createMemoryViewport, DEFAULT_VIEW_POSE, type AppliedFrame } from "./memoryViewport.js";
import { buildBundleManifest, createBundle, readBundle } from "./pipeline/bundle.js";
import { asCliError, CliError, exitCodeFor, fromBookmarkFailure } from "./runtime/errors.js";
import { loadStoreFile, saveStoreFile } from "./snapshotFile.js";

export interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

interface CommandContext {
  io: CliIo;
  logger: Logger;
  store: BookmarkStore;
  /** Context the command reads and writes. */
  context: string;
}

/** Resolves to true when the store changed and must be saved. */
type CommandHandler = (args: string[], ctx: CommandContext) => Promise<boolean>;

interface CommandArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

function parseCommandArgs(
  args: string[],
  valueFlags: readonly string[],
  switchFlags: readonly string[] = [],
): CommandArgs {
  const parsed: CommandArgs = { positionals: [], values: new Map(), switches: new Set() };
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      parsed.positionals.push(arg);
      continue;
    }
    if (valueFlags.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined) throw new CliError("USAGE", `${arg} requires a value.`);
      parsed.values.set(arg, value);
      i += 1;
      continue;
    }
    if (switchFlags.includes(arg)) {
      parsed.switches.add(arg);
      continue;
    }
    throw new CliError("USAGE", `Unknown flag "${arg}".`);
  }
  return parsed;
}

function expectPositionals(parsed: CommandArgs, count: number, usage: string): string[] {
  if (parsed.positionals.length !== count) {
    throw new CliError("USAGE", `Usage: viewmark ${usage}`);
  }
  return parsed.positionals;
}

function parseIndex(value: string, label: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new CliError("USAGE", `${label} must be an integer, got "${value}".`);
  }
  return Number(value);
}

function parseNumber(value: string, label: string, min = -Infinity): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed) || parsed < min) {
    throw new CliError("USAGE", `Invalid ${label} value "${value}".`);
  }
  return parsed;
}

function parseVec3(value: string, label: string): Vec3 {
  const parts = value.split(",").map((part) => part.trim());
  if (parts.length !== 3) {
    throw new CliError("USAGE", `${label} expects x,y,z, got "${value}".`);
  }
  const [x, y, z] = parts.map((part) => parseNumber(part, label));
  return { x, y, z };
}

function parseColor(value: string, label: string): Rgba {
  const parts = value.split(",").map((part) => part.trim());
  if (parts.length !== 4) {
    throw new CliError("USAGE", `${label} expects r,g,b,a, got "${value}".`);
  }
  const [r, g, b, a] = parts.map((part) => parseNumber(part, label, 0));
  if ([r, g, b, a].some((channel) => channel > 1)) {
    throw new CliError("USAGE", `${label} channels must be within [0, 1], got "${value}".`);
  }
  return { r, g, b, a };
}

function parseToggle(value: string, label: string): boolean {
  if (value === "on") return true;
  if (value === "off") return false;
  throw new CliError("USAGE", `${label} expects on or off, got "${value}".`);
}

function unwrap<T>(result: BookmarkResult<T>): T {
  if (!result.ok) throw fromBookmarkFailure(result);
  return result.value;
}

function getRecord(store: BookmarkStore, index: number, context: string): BookmarkResult<BookmarkRecord> {
  const record = store.get(index, context);
  return record ? succeed(record) : indexOutOfRange(index, store.count(context));
}

function round4(value: number): number {
  return Number(value.toFixed(4));
}

function formatNumber(value: number): string {
  return round4(value).toString();
}

function formatVec3(vec: Vec3): string {
  return `${formatNumber(vec.x)},${formatNumber(vec.y)},${formatNumber(vec.z)}`;
}

function describeRecord(index: number, record: BookmarkRecord): string {
  return [
    `#${index}`,
    record.name,
    `pivot=${formatVec3(record.pivotPoint)}`,
    `camera=${formatVec3(record.cameraPosition)}`,
    `distance=${formatNumber(record.cameraDistance)}`,
    `size=${formatNumber(record.projectionSize)}`,
    record.orthographic ? "orthographic" : "perspective",
  ].join("\t");
}

function describePreferences(preferences: BookmarkPreferences): string {
  const toggle = (value: boolean) => (value ? "on" : "off");
  return [
    `animate=${toggle(preferences.animate)}`,
    `markers=${toggle(preferences.showMarkers)}`,
    `labels=${toggle(preferences.showLabels)}`,
    `duration=${formatNumber(preferences.transitionSeconds)}`,
  ].join(" ");
}

function frameToJson(frame: AppliedFrame) {
  const { pose } = frame;
  return {
    instant: frame.instant,
    pivot: [round4(pose.pivot.x), round4(pose.pivot.y), round4(pose.pivot.z)],
    rotation: [round4(pose.rotation.x), round4(pose.rotation.y), round4(pose.rotation.z), round4(pose.rotation.w)],
    distance: round4(pose.distance),
    size: round4(pose.size),
    orthographic: pose.orthographic,
  };
}

const commands = new Map<string, CommandHandler>([
  ["contexts", async (args, { io, store }) => {
    expectPositionals(parseCommandArgs(args, []), 0, "contexts");
    for (const summary of store.contexts()) {
      const marker = summary.active ? "*" : " ";
      const key = summary.key.length > 0 ? summary.key : '""';
      const path = summary.contextPath.length > 0 ? `\t${summary.contextPath}` : "";
      io.writeStdout(`${marker} ${key}\t${summary.count}${path}`);
    }
    return false;
  }],

  ["use", async (args, { io, store }) => {
    const parsed = parseCommandArgs(args, ["--path"]);
    const [key] = expectPositionals(parsed, 1, "use <context> [--path <p>]");
    unwrap(store.setActiveContext(key, parsed.values.get("--path")));
    io.writeStdout(`Active context: ${key}`);
    return true;
  }],

  ["list", async (args, { io, store, context }) => {
    expectPositionals(parseCommandArgs(args, []), 0, "list");
    const records = store.list(context);
    if (records.length === 0) {
      io.writeStdout(`No bookmarks in "${context}".`);
      return false;
    }
    records.forEach((record, index) => io.writeStdout(describeRecord(index, record)));
    return false;
  }],

  ["add", async (args, { io, store, context }) => {
    const parsed = parseCommandArgs(args, ["--pivot", "--euler", "--distance", "--size", "--name"], ["--ortho"]);
    expectPositionals(parsed, 0, "add --pivot x,y,z [--euler x,y,z] [--distance d] [--size s] [--ortho] [--name n]");
    const pivot = parsed.values.get("--pivot");
    if (pivot === undefined) throw new CliError("USAGE", "--pivot is required.");
    const euler = parseVec3(parsed.values.get("--euler") ?? "0,0,0", "--euler");
    const distance = parsed.values.get("--distance");
    const size = parsed.values.get("--size");
    const pose: Pose = {
      pivot: parseVec3(pivot, "--pivot"),
      rotation: quaternionFromEulerDegrees(euler.x, euler.y, euler.z),
      size: size === undefined ? DEFAULT_VIEW_POSE.size : parseNumber(size, "--size", 0),
      orthographic: parsed.switches.has("--ortho"),
      distance: distance === undefined ? DEFAULT_VIEW_POSE.distance : parseNumber(distance, "--distance", 0),
    };
    const record = unwrap(captureBookmark(createMemoryViewport(pose), { name: parsed.values.get("--name") }));
    const index = unwrap(store.add(record, context));
    io.writeStdout(`Added #${index} "${record.name}" to "${context}"`);
    return true;
  }],

  ["edit", async (args, { io, store, context }) => {
    const usage = "edit <i> [--name n] [--euler x,y,z] [--distance d] [--size s] [--ortho on|off] [--color r,g,b,a]";
    const parsed = parseCommandArgs(args, ["--name", "--euler", "--distance", "--size", "--ortho", "--color"]);
    const [raw] = expectPositionals(parsed, 1, usage);
    if (parsed.values.size === 0) throw new CliError("USAGE", `Usage: viewmark ${usage}`);
    const index = parseIndex(raw, "index");
    const current = unwrap(getRecord(store, index, context));

    // Edits orbit the saved pivot; the camera position follows.
    const pose = poseFromRecord(current);
    const euler = parsed.values.get("--euler");
    const distance = parsed.values.get("--distance");
    const size = parsed.values.get("--size");
    const ortho = parsed.values.get("--ortho");
    const color = parsed.values.get("--color");
    if (euler !== undefined) {
      const angles = parseVec3(euler, "--euler");
      pose.rotation = quaternionFromEulerDegrees(angles.x, angles.y, angles.z);
    }
    if (distance !== undefined) pose.distance = parseNumber(distance, "--distance", 0);
    if (size !== undefined) pose.size = parseNumber(size, "--size", 0);
    if (ortho !== undefined) pose.orthographic = parseToggle(ortho, "--ortho");

    const next = recordFromPose(
      pose,
      parsed.values.get("--name") ?? current.name,
      color === undefined ? current.color : parseColor(color, "--color"),
    );
    const updated = unwrap(store.replace(index, next, context));
    const { r, g, b, a } = updated.color;
    io.writeStdout(describeRecord(index, updated));
    io.writeStdout(
      `euler=${formatVec3(eulerDegreesFromQuaternion(updated.orientation))}\tcolor=${[r, g, b, a].map(formatNumber).join(",")}`,
    );
    return true;
  }],

  ["remove", async (args, { io, store, context }) => {
    const [raw] = expectPositionals(parseCommandArgs(args, []), 1, "remove <i>");
    const index = parseIndex(raw, "index");
    const removed = unwrap(store.removeAt(index, context));
    io.writeStdout(`Removed #${index} "${removed.name}"`);
    return true;
  }],

  ["rename", async (args, { io, store, context }) => {
    const [raw, name] = expectPositionals(parseCommandArgs(args, []), 2, "rename <i> <name>");
    const index = parseIndex(raw, "index");
    unwrap(store.rename(index, name, context));
    io.writeStdout(`Renamed #${index} to "${name}"`);
    return true;
  }],

  ["move", async (args, { io, store, context }) => {
    const [from, to] = expectPositionals(parseCommandArgs(args, []), 2, "move <from> <to>");
    const oldIndex = parseIndex(from, "from");
    const finalIndex = unwrap(store.reorder(oldIndex, parseIndex(to, "to"), context));
    const moved = unwrap(getRecord(store, finalIndex, context));
    io.writeStdout(`Moved "${moved.name}" from #${oldIndex} to #${finalIndex}`);
    return true;
  }],

  ["set-position", async (args, { io, store, context }) => {
    const [raw, position] = expectPositionals(parseCommandArgs(args, []), 2, "set-position <i> x,y,z");
    const index = parseIndex(raw, "index");
    const updated = unwrap(store.setPosition(index, parseVec3(position, "position"), context));
    io.writeStdout(
      `Moved camera of #${index} "${updated.name}" to ${formatVec3(updated.cameraPosition)}; pivot ${formatVec3(updated.pivotPoint)}`,
    );
    return true;
  }],

  ["nearest", async (args, { io, store, context }) => {
    const parsed = parseCommandArgs(args, ["--origin", "--direction"]);
    expectPositionals(parsed, 0, "nearest --origin x,y,z --direction x,y,z");
    const origin = parsed.values.get("--origin");
    const direction = parsed.values.get("--direction");
    if (origin === undefined || direction === undefined) {
      throw new CliError("USAGE", "--origin and --direction are required.");
    }
    const ray = parseVec3(direction, "--direction");
    if (length(ray) === 0) throw new CliError("USAGE", "--direction must be non-zero.");

    const records = store.list(context);
    const match = nearestLookTarget(records, parseVec3(origin, "--origin"), normalize(ray));
    if (match === null) {
      io.writeStdout(`No bookmarks in "${context}".`);
      return false;
    }
    io.writeStdout(`#${match.index}\t${records[match.index].name}\tscore=${formatNumber(match.score)}`);
    return false;
  }],

  ["hotkey", async (args, { io, store, context }) => {
    const [digit] = expectPositionals(parseCommandArgs(args, []), 1, "hotkey <digit>");
    const index = hotkeyIndex(digit);
    if (index === null) throw new CliError("USAGE", `Hotkeys are the digits 0-9, got "${digit}".`);
    io.writeStdout(describeRecord(index, unwrap(getRecord(store, index, context))));
    return false;
  }],

  ["jump", async (args, { io, store, context }) => {
    const parsed = parseCommandArgs(args, ["--from-index", "--fps", "--duration"], ["--instant"]);
    const [raw] = expectPositionals(parsed, 1, "jump <i> [--from-index j] [--fps n] [--duration s] [--instant]");
    const target = unwrap(getRecord(store, parseIndex(raw, "index"), context));
    const fromIndex = parsed.values.get("--from-index");
    const start = fromIndex === undefined
      ? DEFAULT_VIEW_POSE
      : poseFromRecord(unwrap(getRecord(store, parseIndex(fromIndex, "--from-index"), context)));

    const preferences = store.getPreferences();
    const fpsValue = parsed.values.get("--fps");
    const fps = fpsValue === undefined ? 30 : parseNumber(fpsValue, "--fps", 1);
    const durationValue = parsed.values.get("--duration");
    const duration = durationValue === undefined
      ? preferences.transitionSeconds
      : parseNumber(durationValue, "--duration", 0);

    const viewport = createMemoryViewport(start);
    let frame = 0;
    const transition = createViewportTransition({ viewport, clock: () => frame / fps, defaultDurationSeconds: duration });
    unwrap(jumpToBookmark(viewport, target, {
      animate: preferences.animate && !parsed.switches.has("--instant"),
      transition,
    }));
    while (transition.state === "animating") {
      frame += 1;
      transition.tick();
    }
    for (const applied of viewport.frames) {
      io.writeStdout(JSON.stringify(frameToJson(applied)));
    }
    return false;
  }],

  ["prefs", async (args, { io, store }) => {
    const parsed = parseCommandArgs(args, ["--animate", "--markers", "--labels", "--duration"]);
    expectPositionals(parsed, 0, "prefs [--animate on|off] [--markers on|off] [--labels on|off] [--duration s]");
    const patch: Partial<BookmarkPreferences> = {};
    const animate = parsed.values.get("--animate");
    const markers = parsed.values.get("--markers");
    const labels = parsed.values.get("--labels");
    const duration = parsed.values.get("--duration");
    if (animate !== undefined) patch.animate = parseToggle(animate, "--animate");
    if (markers !== undefined) patch.showMarkers = parseToggle(markers, "--markers");
    if (labels !== undefined) patch.showLabels = parseToggle(labels, "--labels");
    if (duration !== undefined) patch.transitionSeconds = parseNumber(duration, "--duration", 0);

    if (Object.keys(patch).length === 0) {
      io.writeStdout(describePreferences(store.getPreferences()));
      return false;
    }
    io.writeStdout(describePreferences(unwrap(store.updatePreferences(patch))));
    return true;
  }],

  ["export-bundle", async (args, { io, store }) => {
    const parsed = parseCommandArgs(args, ["--out"]);
    expectPositionals(parsed, 0, "export-bundle --out <zip>");
    const out = parsed.values.get("--out");
    if (out === undefined) throw new CliError("USAGE", "--out is required.");
    const outPath = resolve(out);
    const snapshot = store.toSnapshot();
    const text = serializeSnapshot(snapshot);
    const manifest = buildBundleManifest(text, snapshot);
    try {
      await mkdir(dirname(outPath), { recursive: true });
      await writeFile(outPath, createBundle(text, snapshot));
    } catch (error) {
      throw asCliError(error, "IO", `Failed to write ${outPath}.`);
    }
    io.writeStdout(`Exported ${manifest.bookmarks} bookmarks in ${manifest.contexts} contexts to ${outPath}`);
    return false;
  }],

  ["import-bundle", async (args, { io, logger, store }) => {
    const parsed = parseCommandArgs(args, ["--in"]);
    expectPositionals(parsed, 0, "import-bundle --in <zip>");
    const input = parsed.values.get("--in");
    if (input === undefined) throw new CliError("USAGE", "--in is required.");
    const inPath = resolve(input);
    let bytes: Buffer;
    try {
      bytes = await readFile(inPath);
    } catch (error) {
      throw asCliError(error, "IO", `Failed to read ${inPath}.`);
    }
    const { manifest, snapshotText } = readBundle(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength));
    logger.debug(`Bundle snapshot sha256 ${manifest.snapshotSha256} verified`);
    const { snapshot } = unwrap(parseSnapshot(snapshotText));
    store.restore(snapshot);
    io.writeStdout(`Imported ${manifest.bookmarks} bookmarks in ${manifest.contexts} contexts from ${inPath}`);
    return true;
  }],
]);

export async function runViewmarkCli(
  argv: string[],
  io: CliIo = defaultIo,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const parsed = parseCliConfig(argv, env);
  if (parsed.error === "help") {
    io.writeStdout(renderHelpText());
    return 0;
  }
  if (parsed.error) {
    io.writeStderr(`viewmark: ${parsed.error}`);
    io.writeStdout(renderHelpText());
    return 1;
  }

  const [command, ...args] = parsed.rest;
  if (command === undefined) {
    io.writeStdout(renderHelpText());
    return 0;
  }
  const handler = commands.get(command);
  if (!handler) {
    io.writeStderr(`Unknown command "${command}".`);
    io.writeStdout(renderHelpText());
    return 1;
  }

  const { config } = parsed;
  const logger = createLogger({ level: config.verbose ? "debug" : "warn", write: io.writeStderr });
  try {
    const { store } = await loadStoreFile(config.file, logger);
    const changed = await handler(args, {
      io,
      logger,
      store,
      context: config.context ?? store.activeContext,
    });
    if (changed) {
      await saveStoreFile(config.file, store, logger);
    }
    return 0;
  } catch (error) {
    const cliError = asCliError(error, "IO", "Unexpected failure.");
    io.writeStderr(`viewmark: ${cliError.message}`);
    return exitCodeFor(cliError);
  }
}

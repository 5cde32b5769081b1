import { resolve } from "node:path";

export interface ViewmarkCliConfig {
  file: string;
  /** Context the command targets; null means the snapshot's active context. */
  context: string | null;
  verbose: boolean;
}

export interface ParsedCliConfig {
  config: ViewmarkCliConfig;
  /** Command name and its own arguments, with global flags removed. */
  rest: string[];
  error?: string;
}

export const DEFAULT_SNAPSHOT_FILE = ".viewmark/bookmarks.json";

export function defaultCliConfig(): ViewmarkCliConfig {
  return {
    file: resolve(process.cwd(), DEFAULT_SNAPSHOT_FILE),
    context: null,
    verbose: false,
  };
}

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const config = defaultCliConfig();
  const rest: string[] = [];

  if (env.VIEWMARK_FILE) config.file = resolve(env.VIEWMARK_FILE);
  if (env.VIEWMARK_CONTEXT !== undefined) config.context = env.VIEWMARK_CONTEXT;
  if (env.VIEWMARK_VERBOSE === "1") config.verbose = true;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      rest.push(...argv.slice(index + 1));
      break;
    }
    if (arg === "--file") {
      const value = argv[index + 1];
      if (!value) {
        return { config, rest, error: "--file requires a value." };
      }
      config.file = resolve(value);
      index += 1;
      continue;
    }
    if (arg === "--context") {
      const value = argv[index + 1];
      if (value === undefined) {
        return { config, rest, error: "--context requires a value." };
      }
      config.context = value;
      index += 1;
      continue;
    }
    if (arg === "--verbose") {
      config.verbose = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return { config, rest, error: "help" };
    }
    rest.push(arg);
  }

  return { config, rest };
}

export function renderHelpText(): string {
  return [
    "viewmark",
    "",
    "Usage:",
    "  viewmark [--file <path>] [--context <key>] [--verbose] <command> [args]",
    "",
    "Commands:",
    "  contexts                                  List contexts and their bookmark counts",
    "  use <context> [--path <p>]                Make a context active",
    "  list                                      List bookmarks in the context",
    "  add --pivot x,y,z [--euler x,y,z] [--distance d] [--size s] [--ortho] [--name n]",
    "                                            Capture a bookmark",
    "  edit <i> [--name n] [--euler x,y,z] [--distance d] [--size s] [--ortho on|off] [--color r,g,b,a]",
    "                                            Change bookmark i, keeping its pivot",
    "  remove <i>                                Remove bookmark i",
    "  rename <i> <name>                         Rename bookmark i",
    "  move <from> <to>                          Move a bookmark to a new position",
    "  set-position <i> x,y,z                    Move the saved camera of bookmark i",
    "  nearest --origin x,y,z --direction x,y,z  Bookmark nearest to a look ray",
    "  hotkey <digit>                            Bookmark bound to a number key",
    "  jump <i> [--from-index j] [--fps n] [--duration s] [--instant]",
    "                                            Print the camera frames of a jump",
    "  prefs [--animate on|off] [--markers on|off] [--labels on|off] [--duration s]",
    "                                            Show or change preferences",
    "  export-bundle --out <zip>                 Write a bookmark bundle",
    "  import-bundle --in <zip>                  Replace the store from a bundle",
    "",
    "Flags:",
    `  --file <path>     Snapshot file (default: ${DEFAULT_SNAPSHOT_FILE}, env VIEWMARK_FILE)`,
    "  --context <key>   Target context (default: the active one, env VIEWMARK_CONTEXT)",
    "  --verbose         Log store activity to stderr (env VIEWMARK_VERBOSE=1)",
    "  -h, --help        Show help",
  ].join("\n");
}

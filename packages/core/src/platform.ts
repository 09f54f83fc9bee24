/**
 * Platform detection, home expansion and shell quoting.
 */

import { homedir } from "node:os";
import { join } from "node:path";

export type Platform = "linux" | "darwin" | "win32";

/**
 * Map `process.platform` onto the three command families termdesk knows.
 * Other Unix flavours use the Linux commands.
 */
export function detectPlatform(value: NodeJS.Platform = process.platform): Platform {
  if (value === "win32") return "win32";
  if (value === "darwin") return "darwin";
  return "linux";
}

/**
 * Expand a leading `~` or `~/` to the home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/**
 * Quote one argument for a POSIX shell.
 * Arguments with no special characters are returned unchanged.
 *
 * @example
 * shellQuote("/tmp/notes.txt")    // => /tmp/notes.txt
 * shellQuote("/tmp/my notes.txt") // => '/tmp/my notes.txt'
 * shellQuote("it's")              // => 'it'\''s'
 */
export function shellQuote(arg: string): string {
  if (arg === "") return "''";
  if (/[\s'"$\\!*?()&|<>;[\]{}~`#]/.test(arg)) {
    return "'" + arg.replace(/'/g, "'\\''") + "'";
  }
  return arg;
}

export function shellJoin(args: string[]): string {
  return args.map(shellQuote).join(" ");
}

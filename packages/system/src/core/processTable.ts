/**
 * Parsing of `ps aux` and `tasklist /fo csv /nh` output.
 */

import type { ProcessRow } from "./model.js";

// USER PID %CPU %MEM VSZ RSS TTY STAT START TIME COMMAND
const PS_AUX_ROW = /^(\S+)\s+(\d+)\s+([\d.]+)\s+([\d.]+)\s+\S+\s+\S+\s+\S+\s+\S+\s+\S+\s+\S+\s+(.+)$/;

/**
 * Short name of a command line: the executable's basename, or the whole
 * first word for kernel threads such as `[kworker/0:1]`.
 */
export function processName(command: string): string {
  const first = command.split(/\s+/)[0] ?? "";
  if (first.startsWith("[")) return first;
  const slash = first.lastIndexOf("/");
  return slash >= 0 ? first.slice(slash + 1) : first;
}

export function parsePsAux(output: string): ProcessRow[] {
  const rows: ProcessRow[] = [];
  const lines = output.split("\n").slice(1);

  for (const line of lines) {
    const match = PS_AUX_ROW.exec(line.trim());
    if (!match) continue;

    const command = match[5];
    rows.push({
      pid: Number(match[2]),
      name: processName(command),
      user: match[1],
      cpu: Number(match[3]),
      mem: match[4],
      command,
    });
  }
  return rows;
}

function csvFields(line: string): string[] {
  const fields: string[] = [];
  const field = /"((?:[^"]|"")*)"/g;
  let match: RegExpExecArray | null;
  while ((match = field.exec(line)) !== null) {
    fields.push(match[1].replace(/""/g, '"'));
  }
  return fields;
}

export function parseTasklistCsv(output: string): ProcessRow[] {
  const rows: ProcessRow[] = [];

  for (const line of output.split(/\r?\n/)) {
    const [name, pid, , , mem] = csvFields(line);
    if (name === undefined || pid === undefined || !/^\d+$/.test(pid)) continue;

    rows.push({ pid: Number(pid), name, user: null, cpu: null, mem: mem ?? "", command: name });
  }
  return rows;
}

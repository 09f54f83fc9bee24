/**
 * Input fields shared by the ssh tools.
 */

import * as z from "zod/v4";
import type { TargetRef } from "../core/services/SshService.js";

export const hostField = z.string().min(1).describe("Host name or IP address");
export const userField = z.string().min(1).describe("Remote user name");
export const portField = z.number().int().min(1).max(65535).optional().describe("SSH port (default: 22)");
export const keyFileField = z.string().optional().describe("Private key file (~ is expanded)");
export const sessionIdField = z.string().min(1).describe("Session id from ssh_connect");

/** A saved connection, or host/user/port/keyFile for a one-off target. */
export const targetFields = {
  connection: z.string().optional().describe("Saved connection id or name"),
  host: z.string().optional().describe("Host (when no saved connection is given)"),
  user: z.string().optional().describe("User (when no saved connection is given)"),
  port: portField,
  keyFile: keyFileField,
};

export interface TargetFieldsInput {
  connection?: string;
  host?: string;
  user?: string;
  port?: number;
  keyFile?: string;
}

export function toTargetRef(input: TargetFieldsInput): TargetRef {
  if (input.connection) return { connection: input.connection };
  return { host: input.host ?? "", user: input.user ?? "", port: input.port, keyFile: input.keyFile };
}

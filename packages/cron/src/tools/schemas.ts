/**
 * Input fields shared by several cron tools.
 */

import * as z from "zod/v4";

export const scheduleField = z
  .string()
  .min(1)
  .describe("Five fields: minute hour day month weekday, e.g. '*/15 * * * *'");

export const commandField = z.string().min(1).describe("Shell command to run (single line)");

export const indexField = z.number().int().min(0).describe("Job index as shown by cron_list (0-based)");

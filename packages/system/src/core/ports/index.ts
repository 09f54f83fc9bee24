export type { ProcessTable } from "./ProcessTable.js";
export type { ProcessSignaller } from "./ProcessSignaller.js";

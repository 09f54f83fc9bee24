export type { CrontabStore } from "./CrontabStore.js";

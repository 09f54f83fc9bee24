export type { SessionSpawner, SessionHandle, SessionCallbacks, OutputStream } from "./SessionSpawner.js";

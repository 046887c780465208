/**
 * CHANGE: Centralized re-exports of the Node built-ins the shell layer uses
 * WHY: One import site for child_process/fs/path keeps SHELL modules uniform and easy to fake
 *
 * Invariant: re-export compatible objects/functions, avoiding `export *` for modules with `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { exec, spawn } from "node:child_process";
export { promisify } from "node:util";

// CHANGE: Re-export through constants instead of `export *`
// WHY: node:path (and often node:fs) use `export =`, which is incompatible with `export *`
// REF: TypeScript limitation for `export =`
export const fs = fsNS;
export const path = pathNS;

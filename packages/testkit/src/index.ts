export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { createTempRoot, removeDir, withTempDir, withTempCatalog } from "./fs.js";
export { seedDatabase, queryDatabase } from "./db.js";

export { createProgram, runCli } from "./program";
export { createNodeIo, waitForSignal, type CliIo } from "./io";

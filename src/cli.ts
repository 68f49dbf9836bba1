#!/usr/bin/env node

import { createNodeIo, runCli } from "./commands";

process.exitCode = await runCli(process.argv.slice(2), createNodeIo());

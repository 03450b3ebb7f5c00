#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { createServices } from "./cli/services.js";
import { config } from "./config/index.js";
import { setLogLevel } from "./config/logger.js";

setLogLevel(config.logLevel);

const program = buildProgram({ services: createServices(config), manifestUrl: config.manifestUrl });
await program.parseAsync(process.argv);

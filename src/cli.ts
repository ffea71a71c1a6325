#!/usr/bin/env node

import { program } from "./cli/program.js";

program.parseAsync().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});

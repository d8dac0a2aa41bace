#!/usr/bin/env node

import { hideBin } from "yargs/helpers";
import { createCli } from "./cli";

createCli(hideBin(process.argv))
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });

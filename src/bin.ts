#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { createCli } from "./cli.js";

await createCli(hideBin(process.argv)).parseAsync();

#!/usr/bin/env node

import { main } from "../cli.js";

await main(["stop-all", ...process.argv.slice(2)]);

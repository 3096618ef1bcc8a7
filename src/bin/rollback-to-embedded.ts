#!/usr/bin/env node

import { main } from "../cli.js";

await main(["rollback-to-embedded", ...process.argv.slice(2)]);

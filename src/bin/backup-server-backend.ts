#!/usr/bin/env node

import { main } from "../cli.js";

await main(["backup-server-backend", ...process.argv.slice(2)]);

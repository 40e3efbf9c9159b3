#!/usr/bin/env node

import { run } from "./commands/index.js";

await run();

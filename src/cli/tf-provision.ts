#!/usr/bin/env node
/**
 * tf-provision executable
 */

import { main } from "./main.js";

await main();

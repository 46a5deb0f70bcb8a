#!/usr/bin/env node

/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import {main} from "../src/cli.js";

await main();

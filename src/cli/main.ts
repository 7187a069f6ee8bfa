#!/usr/bin/env node
// src/cli/main.ts

import { runMain } from './index.js';

await runMain();

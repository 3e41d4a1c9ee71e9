#!/usr/bin/env node

/**
 * tiered-migrate CLI
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();

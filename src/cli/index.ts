#!/usr/bin/env node
// Retention CLI

import { createProgram } from './program.js';

await createProgram().parseAsync();

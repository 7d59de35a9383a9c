#!/usr/bin/env node
import 'dotenv/config';
import { buildProgram } from './program.js';

await buildProgram().parseAsync();

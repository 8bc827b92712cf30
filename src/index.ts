#!/usr/bin/env node

import process from 'node:process';
import { setupCLI } from './cli.js';

setupCLI().parse(process.argv);

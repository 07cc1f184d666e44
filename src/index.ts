#!/usr/bin/env node

import { program } from './shelf/cli.ts';

await program.parseAsync();

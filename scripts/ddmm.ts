#!/usr/bin/env node
import { main } from '../src/cli/program.js';
import { handleError } from '../src/cli/utils/error-handler.js';

main().catch(handleError);

#!/usr/bin/env node

import { createProgram } from './cli';

createProgram().parse();

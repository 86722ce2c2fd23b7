#!/usr/bin/env node
import { run } from 'cmd-ts';
import { cmd } from './commands/index';
import { Tracer } from './tracer';

void Tracer.run(() => run(cmd, process.argv.slice(2)));

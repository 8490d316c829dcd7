#!/usr/bin/env node
import { StudyflowCLI } from '../src/cli';

new StudyflowCLI()
    .run(process.argv)
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error('Fatal error:', err);
        process.exitCode = 1;
    });

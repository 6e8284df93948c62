#!/usr/bin/env -S node --import tsx
// src/cli/main.ts

import figlet from 'figlet';
import { rainbow } from 'gradient-string';
import process from 'node:process';
import { createProgram } from './index.ts';

if (process.stdout.isTTY) {
    console.log(rainbow.multiline(
        figlet.textSync('LSB-Veil', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
    console.log(rainbow('Hide any file in the least-significant bits of an image.\n'));
}

await createProgram().parseAsync(process.argv);

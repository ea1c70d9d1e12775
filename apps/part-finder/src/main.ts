import 'dotenv/config';

import { promises as fs } from 'node:fs';

import { runPartFinder } from './cli.js';

process.exitCode = await runPartFinder({
  argv: process.argv.slice(2),
  env: process.env,
  io: {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    writeFile: (filePath, contents) => fs.writeFile(filePath, contents, 'utf8'),
  },
});

#!/usr/bin/env node


import * as dotenv from 'dotenv';
import * as path from 'path';

import { runCli } from './cli';
import { printErrorAndExit } from './utils/utils';



const envFiles = [
  '.env.local',
  `.env.${process.env.NODE_ENV}`,
  '.env'
];

envFiles.forEach(file => {
  const envPath = path.resolve(process.cwd(), file);
  dotenv.config({ path: envPath });
});


// Start the application
runCli(process.argv.slice(2))
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    printErrorAndExit(`💥 Unhandled error: ${error}`, 1);
  });

#!/usr/bin/env node
import { main, reportFatal } from './index.js';

main(process.argv.slice(2))
  .catch(reportFatal)
  .then((exitCode) => {
    process.exitCode = exitCode;
  });

#!/usr/bin/env node
import { createLogger } from './logger.js';
import { installProcessTraps, main, EXIT } from './main.js';

const logger = createLogger({ level: 'info', pretty: false });
installProcessTraps(logger);

main(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err }, 'fatal');
    process.exitCode = EXIT.FATAL;
  },
);

import pino from 'pino';

// stdout belongs to the child process; diagnostics go to fd 2.
// The level is raised or lowered from LOG_LEVEL once the config is loaded.
export const logger = pino(
  { name: 'qgraphic-launcher', level: 'warn' },
  pino.destination({ dest: 2, sync: true })
);

import pino from 'pino';

// JSON lines on stdout; the model server is usually run inside a container
export const logger = pino({
  name: 'transformer-serve',
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"time":"${new Date().toISOString()}"`,
});

/**
 * Child logger tagged with the component that emits it
 */
export function componentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export default logger;

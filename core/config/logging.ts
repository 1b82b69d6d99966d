import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  defaultLevel: 'error',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    model: {
      level: 'error'
    },
    layout: {
      level: 'error'
    },
    config: {
      level: 'warn'
    }
  }
} as const;

export type LoggerServiceName = keyof typeof loggingConfig.services;

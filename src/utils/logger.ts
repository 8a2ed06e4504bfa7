import pino from 'pino';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

const { level, pretty, file } = config.logging;

// stdout carries keys and previews, so every log target writes to stderr
const targets: pino.TransportTargetOptions[] = [
  pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
        level,
      }
    : {
        target: 'pino/file',
        options: { destination: 2 },
        level,
      },
];

if (file) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  targets.push({
    target: 'pino/file',
    options: {
      destination: file,
      mkdir: true,
    },
    level,
  });
}

export const logger =
  level === 'silent'
    ? pino({ level: 'silent' })
    : pino({
        level,
        transport: {
          targets,
        },
        serializers: {
          err: pino.stdSerializers.err,
        },
        base: {
          version: config.version,
        },
      });

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}

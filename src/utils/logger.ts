import { getLogger, type Logger } from '@logtape/logtape';

export const LOGGER_ROOT = 'cellwire';

export function getCellwireLogger(component: string, logger?: Logger): Logger {
  return logger ?? getLogger([LOGGER_ROOT, component]);
}

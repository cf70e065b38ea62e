import log from 'electron-log/node';
import path from 'path';

// Configure logging
log.transports.file.level = 'debug';
log.transports.console.level = 'info';

// Keep the log file beside the data root unless told otherwise
log.transports.file.resolvePathFn = () => path.join(process.env.OECT_LOG_DIR || 'logs', 'backend.log');

log.variables.process = 'Backend';

// Tests assert on values, not on log output
if (process.env.VITEST) {
    log.transports.file.level = false;
    log.transports.console.level = false;
}

export function configureLogging(options: { dir?: string; level?: 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly' }): void {
    if (options.dir) {
        const dir = options.dir;
        log.transports.file.resolvePathFn = () => path.join(dir, 'backend.log');
    }
    if (options.level && !process.env.VITEST) {
        log.transports.file.level = options.level;
    }
}

export default log;

import { log } from 'crawlee';

const LOG_LEVELS = {
    DEBUG: log.LEVELS.DEBUG,
    INFO: log.LEVELS.INFO,
    WARNING: log.LEVELS.WARNING,
    WARN: log.LEVELS.WARNING,
    ERROR: log.LEVELS.ERROR,
    OFF: log.LEVELS.OFF,
} as const;

type LevelName = keyof typeof LOG_LEVELS;

function isLevelName(name: string): name is LevelName {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, name);
}

/** Applies CRAWLEE_LOG_LEVEL; `--verbose` / `-v` wins and forces DEBUG. */
export function configureLogLevel(configured: string, argv: readonly string[] = process.argv): void {
    const verbose = argv.includes('--verbose') || argv.includes('-v');
    const name = verbose ? 'DEBUG' : configured.trim().toUpperCase();
    if (name && !isLevelName(name)) {
        log.warning(`[Config] Unknown CRAWLEE_LOG_LEVEL "${configured}", using INFO`);
    }
    log.setLevel(isLevelName(name) ? LOG_LEVELS[name] : LOG_LEVELS.INFO);
}

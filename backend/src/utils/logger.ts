import pino from 'pino';

const DEFAULT_LEVELS: Record<string, pino.LevelWithSilent> = {
    production: 'info',
    test: 'silent',
};

function resolveLevel(env: NodeJS.ProcessEnv): string {
    return env.LOG_LEVEL || DEFAULT_LEVELS[env.NODE_ENV ?? ''] || 'debug';
}

/** Human-readable output is for local runs only; other environments log JSON lines. */
function prettyTransport(env: NodeJS.ProcessEnv): pino.TransportSingleOptions | undefined {
    if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') return undefined;
    try {
        require.resolve('pino-pretty');
    } catch {
        return undefined;
    }
    return { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } };
}

export const logger = pino({
    level: resolveLevel(process.env),
    serializers: pino.stdSerializers,
    base: { service: 'university-admin-api' },
    transport: prettyTransport(process.env),
});

/** Logger bound to a component, e.g. `createChildLogger({ component: 'auth' })`. */
export function createChildLogger(bindings: Record<string, unknown>) {
    return logger.child(bindings);
}

import { Server } from 'http';
import { createApp, createDependencies } from './presentation/app';
import { Config, loadConfig, validateConfig } from './config';

/** Time allowed for cancelled renders to kill ffmpeg and clear their scratch dirs */
const SHUTDOWN_GRACE_MS = 15000;

function loadValidConfig(): Config {
    const config = loadConfig();
    const problems = validateConfig(config);
    if (problems.length > 0) {
        console.error('❌ Configuration validation failed:');
        problems.forEach((problem) => console.error(`  - ${problem}`));
        process.exit(1);
    }
    return config;
}

/**
 * SIGTERM/SIGINT: stop accepting connections and cancel every in-flight render.
 * The process exits once the server has closed, which happens after each
 * cancelled render has answered.
 */
function installShutdownHandlers(server: Server, shutdown: AbortController): void {
    const onSignal = (signal: NodeJS.Signals) => {
        if (shutdown.signal.aborted) {
            return;
        }
        console.log(`🛑 ${signal} received, cancelling in-flight renders...`);
        shutdown.abort();

        server.close((error) => {
            if (error) {
                console.error('💥 Error while closing server:', error);
                process.exit(1);
            }
            console.log('👋 Server closed');
            process.exit(0);
        });

        setTimeout(() => {
            console.error(`⏱️ Renders still running after ${SHUTDOWN_GRACE_MS}ms, exiting`);
            process.exit(1);
        }, SHUTDOWN_GRACE_MS).unref();
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
}

async function main(): Promise<void> {
    console.log('🎬 Slideshow Render Worker starting');
    const config = loadValidConfig();

    const dependencies = createDependencies(config);
    await dependencies.overlays.describe();

    const shutdown = new AbortController();
    const app = createApp(config, { ...dependencies, shutdownSignal: shutdown.signal });

    const server = app.listen(config.port, () => {
        console.log(`✅ Listening on :${config.port} (${config.environment})`);
        console.log(`   Output ${config.outputWidth}x${config.outputHeight} @ ${config.outputFps}fps, scratch in ${config.scratchRoot}`);
    });
    installShutdownHandlers(server, shutdown);
}

main().catch((error) => {
    console.error('💥 Fatal error during bootstrap:', error);
    process.exit(1);
});

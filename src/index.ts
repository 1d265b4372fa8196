import { createApp, createDependencies } from './presentation/app';
import { getConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🎨 Image Studio Bot - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = getConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Wire components and start the server
        console.log('🚀 Initializing application components...');
        const deps = createDependencies(config);
        const app = createApp(config, deps);

        if (config.sessionTtlSeconds > 0 && config.sessionSweepIntervalSeconds > 0) {
            deps.sessionStore.startEviction(config.sessionSweepIntervalSeconds * 1000);
        }

        app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Session TTL: ${config.sessionTtlSeconds}s`);
        });
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});

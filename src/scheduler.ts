import { createDependencies } from './presentation/app';
import { defaultAutomationConfig, getEnvVar, loadConfig, validateConfig } from './config';
import { assertAutomationConfig, loadAutomationConfigFile } from './config/automationConfig';
import { AutomationScheduler } from './application/AutomationScheduler';
import { AutomationConfig } from './domain/entities/AutomationConfig';

async function main(): Promise<void> {
    console.log('⏰ Product Video Automation - starting scheduler...');

    const config = loadConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    // An optional YAML file overrides the environment defaults
    const configPath = getEnvVar('AUTOMATION_CONFIG_PATH', '');
    let automationConfig: AutomationConfig;
    if (configPath) {
        automationConfig = await loadAutomationConfigFile(configPath, defaultAutomationConfig(config));
        console.log(`📋 Loaded automation config from ${configPath}`);
    } else {
        automationConfig = defaultAutomationConfig(config);
        assertAutomationConfig(automationConfig);
    }

    const { jobRunner } = createDependencies(config);
    const profileId = getEnvVar('SCHEDULER_PROFILE_ID', 'scheduler');

    const scheduler = new AutomationScheduler(
        automationConfig,
        async () => {
            const job = await jobRunner.runNow(profileId, automationConfig);
            if (job.status === 'failed') {
                throw new Error(job.error ?? `Job ${job.jobId} failed`);
            }
        },
        { timezone: config.scheduleTimezone }
    );

    scheduler.start();
    console.log('✅ Scheduler started. Press Ctrl+C to stop.');

    const shutdown = (signal: string) => {
        console.log(`🛑 ${signal} received, stopping scheduler...`);
        scheduler.stop();
        scheduler.waitForIdle()
            .then(() => process.exit(0))
            .catch((error) => {
                console.error('💥 Error during shutdown:', error);
                process.exit(1);
            });
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
    console.error('💥 Fatal error:', error);
    process.exit(1);
});

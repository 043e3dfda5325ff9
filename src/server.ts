import { buildPipelineConfig, buildServerConfig, loadEnvFiles } from './config';
import { createApp } from './app';
import { toErrorMessage } from './errors';
import { PipelineCoordinator } from './services/pipeline';

loadEnvFiles();

process.on('uncaughtException', (err) => {
    console.error('[FATAL] Uncaught Exception:', err);
});

process.on('unhandledRejection', (reason, promise) => {
    console.error('[FATAL] Unhandled Rejection at:', promise, 'reason:', reason);
});

console.log('[STARTUP] Parsing command line arguments:', process.argv);

try {
    const { port, host } = buildServerConfig(process.argv.slice(2));
    const pipelineConfig = buildPipelineConfig();
    console.log('[STARTUP] PORT configured as:', port);
    console.log('[STARTUP] HOST configured as:', host);
    console.log('[STARTUP] Output directory:', pipelineConfig.outputDir);
    console.log('[STARTUP] Script writer:', pipelineConfig.explainer ? pipelineConfig.explainer.model : 'disabled');

    const app = createApp({
        coordinator: PipelineCoordinator.fromConfig(pipelineConfig),
        outputDir: pipelineConfig.outputDir,
    });

    app.listen(port, host, () => {
        console.log(`[STARTUP] Slide Video Agent listening on ${host}:${port}`);
        console.log('[STARTUP] Healthcheck endpoint: /.well-known/agent-card.json');
        console.log('[STARTUP] Conversion endpoint: /convert');
    });
} catch (error) {
    console.error('[STARTUP] Cannot start:', toErrorMessage(error));
    process.exitCode = 1;
}

import fs from 'fs';
import { createApp } from './app';
import { config } from './config';

// Ensure data directories exist
const dirs = [config.dataDir, config.uploadsDir, config.outputsDir, config.jobsDir];
for (const dir of dirs) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

const app = createApp();

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\nBilingual subtitle service`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Translation provider: ${config.translationProvider}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health                  - Check provider status`);
  console.info(`   - GET  /api/jobs                    - List all jobs`);
  console.info(`   - POST /api/jobs                    - Create new job`);
  console.info(`   - GET  /api/jobs/:id                - Get job details`);
  console.info(`   - POST /api/jobs/:id/start          - Start processing`);
  console.info(`   - POST /api/jobs/:id/cancel         - Cancel a running job`);
  console.info(`   - GET  /api/jobs/:id/download/:type - Download an output`);
  console.info(`   - POST /api/upload/:id/srt          - Upload an SRT file`);
  console.info(`\n`);
});

export default app;

import fs from 'fs';
import { createApp } from './app';
import { config } from './config';
import { setLogLevel } from './utils/logger';

setLogLevel(config.logLevel);

// Ensure data directories exist
for (const dir of [config.dataDir, config.outputsDir]) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

const app = createApp();

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎬 Subtitle Translator Backend`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health      - Check service status`);
  console.info(`   - POST /api/translate   - Translate an SRT file (fields: source, context)`);
  console.info(`   - GET  /outputs/:file   - Download a translated SRT file`);
  console.info(`\n`);
});

export default app;

import 'dotenv/config';
import { loadRagConfig, validateRagConfig } from './config/rag-config.js';
import { createRagContext } from './services/rag/context.js';
import { createApp } from './app.js';

// Validate required environment variables
const config = loadRagConfig();
validateRagConfig(config);

const ctx = createRagContext(config);
const app = createApp(ctx, config);

// Start server
app.listen(config.port, () => {
  console.log(`RAG API running on port ${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/health`);
});

export default app;

// index.ts - Chat server entry point: wire backends once, then serve the API and the web app

import { join } from 'node:path';
import { serve } from '@hono/node-server';
import { serveStatic } from '@hono/node-server/serve-static';
import { Hono } from 'hono';
import { loadConfig, type ServerConfig } from './config.ts';
import { createGeminiBackend } from './gemini_backend.ts';
import { createChatHandler } from './handler.ts';
import { createResponder } from './response_orchestrator.ts';
import { createServiceClient, SupabaseBlobStore } from './storage_backend.ts';
import { errorMessage } from './types.ts';
import { createUsageLogger } from './usage_logger.ts';
import { probeVideoDurationSeconds } from './video_duration.ts';

function main(): void {
  let config: ServerConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error('[Server] Startup aborted:', errorMessage(err));
    process.exitCode = 1;
    return;
  }

  const supabase = createServiceClient(config.supabaseUrl, config.supabaseServiceRoleKey);
  const store = new SupabaseBlobStore(supabase.storage);

  const inference = createGeminiBackend({
    apiKey: config.googleApiKey,
    store,
    textModel: config.textModel,
    multimodalModel: config.multimodalModel,
    filePollIntervalMs: config.filePollIntervalMs,
    filePollMaxAttempts: config.filePollMaxAttempts,
  });

  const usageLogger = config.enableUsageLog && config.logBucketName
    ? createUsageLogger(store, config.logBucketName, probeVideoDurationSeconds)
    : null;

  const respond = createResponder({
    inference,
    store,
    mediaBucket: config.fileBucketName,
    maxPromptSizeMb: config.maxPromptSizeMb,
    timeZone: config.logTimeZone,
    usageLogger,
  });

  const handleChat = createChatHandler({
    respond,
    maxPromptSizeMb: config.maxPromptSizeMb,
    userIdentityHeader: config.userIdentityHeader,
    devMode: config.devMode,
  });

  const app = new Hono();
  app.all('/api/*', (c) => handleChat(c.req.raw));
  app.get('/healthz', (c) => handleChat(c.req.raw));
  app.use('/*', serveStatic({ root: config.staticRoot }));
  app.get('*', serveStatic({ path: join(config.staticRoot, 'index.html') }));

  serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    console.log('[Server] Listening:', {
      address: `http://${info.address}:${info.port}`,
      usageLog: usageLogger ? config.logBucketName : 'disabled',
      maxPromptSizeMb: config.maxPromptSizeMb,
    });
  });
}

main();

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager } from './configManager.js';
import { openDatabase } from './database.js';
import { errorMessage } from './errors.js';
import { applyDebugSettings, createLogger, NAMESPACES } from './logging.js';
import { createApp } from './server.js';
import { createInterrogationService } from './services/createInterrogationService.js';
import { StoryService } from './services/StoryService.js';

const log = createLogger(NAMESPACES.server.main);
const STORIES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'data', 'stories');

/** Import the bundled stories into an empty database. */
async function seedStories(stories: StoryService): Promise<void> {
  if ((await stories.listStories()).length > 0 || !fs.existsSync(STORIES_DIR)) return;
  for (const file of fs.readdirSync(STORIES_DIR).filter(name => name.endsWith('.json'))) {
    try {
      const story = stories.importStory(JSON.parse(fs.readFileSync(path.join(STORIES_DIR, file), 'utf-8')));
      log('[BOOT] seeded story %s from %s', story.id, file);
    } catch (error) {
      log('[BOOT] could not seed %s: %s', file, errorMessage(error));
    }
  }
}

async function main(): Promise<void> {
  const configManager = new ConfigManager();
  applyDebugSettings(configManager.getConfig().debug?.enabledNamespaces);

  const db = openDatabase(configManager.getDatabasePath());
  const { service, stories } = createInterrogationService(configManager, db);
  await seedStories(stories);

  const features = configManager.getFeatures();
  if (features.preloadActiveHours > 0) {
    const loaded = await service.preloadActive(features.preloadActiveHours, features.preloadLimit);
    log('[BOOT] preloaded %d agents', loaded);
  }

  const port = configManager.getPort();
  const server = createApp(service).listen(port, () => {
    console.log(`Interrogation engine listening on port ${port}`);
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    log('[BOOT] %s received, draining pending writes', signal);
    server.close();
    service
      .drain()
      .then(() => {
        db.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Failed to start interrogation engine:', error);
  process.exit(1);
});

import type { Environment } from 'nunjucks';
import { ConfigManager } from '../../configManager.js';
import { createLogger, NAMESPACES } from '../../logging.js';
import { ClassifierLocationDetector } from './ClassifierLocationDetector.js';
import { HeuristicLocationDetector } from './HeuristicLocationDetector.js';
import { LocationRevealDetector } from './LocationRevealDetector.js';

const log = createLogger(NAMESPACES.agents.detector);

export function createLocationDetector(configManager: ConfigManager, env?: Environment): LocationRevealDetector {
  const features = configManager.getFeatures();
  log('[DETECT] using %s location detector', features.locationDetector);
  if (features.locationDetector === 'classifier') {
    return new ClassifierLocationDetector(configManager, env);
  }
  return new HeuristicLocationDetector(features.revealProximityWindow);
}

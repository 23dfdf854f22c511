import debug from 'debug';

export const NAMESPACES = {
  server: {
    main: 'interrogation:server',
    http: 'interrogation:server:http'
  },
  services: {
    interrogation: 'interrogation:services:interrogation',
    story: 'interrogation:services:story'
  },
  agents: {
    base: 'interrogation:agents:base',
    character: 'interrogation:agents:character',
    pipeline: 'interrogation:agents:pipeline',
    reconstructor: 'interrogation:agents:reconstructor',
    detector: 'interrogation:agents:detector',
    classifier: 'interrogation:agents:classifier'
  },
  stores: {
    agents: 'interrogation:stores:agents',
    conversation: 'interrogation:stores:conversation',
    persistence: 'interrogation:stores:persistence'
  },
  llm: {
    client: 'interrogation:llm:client',
    custom: 'interrogation:llm:custom'
  },
  utils: {
    tokens: 'interrogation:utils:tokens'
  }
} as const;

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Turn on namespaces from config unless DEBUG was already set in the environment.
 */
export function applyDebugSettings(enabledNamespaces: string | undefined): void {
  if (process.env.DEBUG || !enabledNamespaces) return;
  debug.enable(enabledNamespaces);
}

// This module builds the process-wide fetch clients from resolved configuration.

import type { FastifyBaseLogger } from 'fastify';
import { AgentHttpClient, FetchHttpClient, type ClientPolicy, type HttpClient } from './client.js';

export type HttpClients = Readonly<Record<ClientPolicy, HttpClient>>;

export interface HttpClientRuntimeConfig {
  userAgent: string;
}

export function createHttpClients(config: HttpClientRuntimeConfig, logger?: FastifyBaseLogger): HttpClients {
  logger?.debug(
    {
      event: 'http_clients_built',
      userAgent: config.userAgent,
      policies: ['default', 'secure']
    },
    'http_clients_built'
  );

  return {
    default: new FetchHttpClient({ userAgent: config.userAgent, logger }),
    secure: new AgentHttpClient({ userAgent: config.userAgent, logger })
  };
}

// Called once on shutdown so keep-alive sockets do not hold the process open.
export function closeHttpClients(clients: HttpClients): void {
  clients.default.close();
  clients.secure.close();
}

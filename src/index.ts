#!/usr/bin/env node
import type http from 'node:http';
import { parseArgs } from 'node:util';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { ConfigStore } from './config/store.js';
import { setLogLevel, setJsonLogging, createLogger } from './utils/logger.js';
import { Gateway } from './gateway/orchestrator.js';
import { MetricsCollector } from './metrics/collector.js';
import { createMetricsServer } from './metrics/server.js';
import { createHttpProxy } from './server/http-proxy.js';
import { registerTools } from './server/tools.js';
import { VERSION } from './version.js';

const log = createLogger('main');

const { values: flags } = parseArgs({
  options: {
    config: { type: 'string', short: 'c' },
    mcp: { type: 'boolean', default: false },
    'mcp-only': { type: 'boolean', default: false },
  },
  strict: true,
});

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

async function main(): Promise<void> {
  log.info(`Switchyard ${VERSION} starting...`);

  // 1. Load configuration
  const configPath = flags.config;
  const store = new ConfigStore(() => loadConfig(configPath !== undefined ? { path: configPath } : {}));
  const config = store.current;
  setLogLevel(config.logging.level);
  setJsonLogging(config.logging.json);
  log.info(`Configuration loaded: ${config.policies.length} policies, default "${config.defaultPolicy}"`);

  // 2. Build the gateway
  const metrics = new MetricsCollector({ collectDefaults: true });
  const gateway = new Gateway(config, { metrics });
  store.onReload(next => {
    setLogLevel(next.logging.level);
    setJsonLogging(next.logging.json);
    gateway.reload(next);
  });

  const servers: http.Server[] = [];

  // 3. HTTP front end (unless --mcp-only)
  if (!flags['mcp-only']) {
    const httpServer = createHttpProxy({ gateway, config: () => store.current });
    httpServer.listen(config.server.port, config.server.host, () => {
      log.info(`HTTP gateway listening on http://${config.server.host}:${config.server.port}`);
    });
    servers.push(httpServer);

    if (config.metrics.enabled) {
      const metricsServer = createMetricsServer(metrics);
      metricsServer.listen(config.metrics.port, config.server.host, () => {
        log.info(`Metrics on http://${config.server.host}:${config.metrics.port}/metrics`);
      });
      servers.push(metricsServer);
    }
  }

  // 4. Configuration reload
  process.on('SIGHUP', () => {
    log.info('SIGHUP received, reloading configuration');
    store.reload();
  });
  if (process.env['SWITCHYARD_CONFIG_HOT_RELOAD'] === 'true') {
    store.startAutoReload();
  }

  // 5. Shutdown
  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    store.stopAutoReload();
    Promise.all(servers.map(closeServer)).then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('Error while closing servers', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // 6. MCP stdio server (--mcp or --mcp-only)
  if (flags.mcp || flags['mcp-only']) {
    const server = new McpServer({
      name: 'switchyard',
      version: VERSION,
    });

    registerTools(server, gateway);
    log.info('MCP tools registered');

    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.info('Switchyard is running on stdio transport');
  }
}

main().catch((err) => {
  log.error('Fatal error during startup', err);
  process.exit(1);
});

import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import { loadConfig } from './config.js';
import { log, setLogLevel } from './logger.js';
import { createTechemRegistry } from './techem/index.js';
import { WMBusMeterService, type WMBusReadingEvent, type WMBusUnknownDeviceEvent } from './meters/service.js';
import { createWMBusRouter } from './meters/routes.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const app = express();
app.use(cors());
app.use(express.json());

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Services
const registry = createTechemRegistry(log.child('Registry'));
const meterService = new WMBusMeterService(registry, {
  config: { meterIds: config.meterIds, maxReadings: config.maxReadings, demo: config.demo },
  logger: log.child('WMBus'),
});

// Broadcast to all WS clients
function broadcast(data: unknown) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

meterService.on('reading', ({ meter, reading }: WMBusReadingEvent) => {
  broadcast({ type: 'wmbus_reading', meterId: meter.id, reading });
});

meterService.on('unknown_device', ({ meterId }: WMBusUnknownDeviceEvent) => {
  log.debug(`Frame from ${meterId} has no decoder`);
});

// ============================================================================
// REST endpoints
// ============================================================================

app.get('/api/health', (_req, res) => {
  res.json({
    name: 'Meterbus',
    version: '0.1.0',
    uptime: process.uptime(),
    status: 'operational',
    decoders: registry.list().length,
  });
});

app.use('/api', createWMBusRouter(meterService, registry));

// ============================================================================
// WebSocket handling
// ============================================================================

wss.on('connection', (ws: WebSocket) => {
  log.info('⚡ Client connected');
  ws.send(JSON.stringify({ type: 'wmbus_meters', meters: meterService.getMeters() }));
  ws.on('close', () => log.info('⚡ Client disconnected'));
});

function shutdown() {
  meterService.stopDemo();
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

server.listen(config.port, config.host, () => {
  log.info(`⚡ HTTP http://${config.host}:${config.port}  WS ws://${config.host}:${config.port}/ws`);
  log.info(`⚡ Decoders: ${registry.list().map(d => d.name).join(' ')}`);
});

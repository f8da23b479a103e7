import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app.js';
import { config } from './config.js';
import { createSimulatorContext } from './context.js';
import { broadcastCommandUpdate, setupWebSocket } from './websocket/ws-server.js';

// ─── Simulator ───────────────────────────────────────────────────────────────

const ctx = createSimulatorContext({ onCommandUpdate: broadcastCommandUpdate });

const app = createApp(ctx, {
  apiKey: config.apiKey,
  rateLimitPerMin: config.rateLimitPerMin,
  corsOrigins: config.corsOrigins,
});
const httpServer = createServer(app);

// ─── WebSocket ───────────────────────────────────────────────────────────────

const io = new SocketIOServer(httpServer, {
  cors: { origin: config.corsOrigins, methods: ['GET', 'POST'] },
});

setupWebSocket(io);

// ─── Start Server ────────────────────────────────────────────────────────────

httpServer.listen(config.port, () => {
  console.log(`
╔═══════════════════════════════════════════════════════╗
║               SATELLITE TASKING SIMULATOR             ║
╠═══════════════════════════════════════════════════════╣
║  REST API:    http://localhost:${String(config.port).padEnd(23)}║
║  WebSocket:   ws://localhost:${String(config.port).padEnd(25)}║
║  Images:      ${config.imageDir.slice(-40).padEnd(40)}║
║  Time scale:  ${String(config.pipeline.timeScale).padEnd(40)}║
║  Environment: ${config.nodeEnv.padEnd(40)}║
╚═══════════════════════════════════════════════════════╝
  `);
});

// ─── Shutdown ────────────────────────────────────────────────────────────────

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[SERVER] ${signal} received, waiting for ${ctx.supervisor.size} pipeline task(s)`);

  io.close();
  await ctx.supervisor.drain();
  httpServer.close(() => process.exit(0));
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(err => {
      console.error('[SERVER] shutdown failed:', err);
      process.exit(1);
    });
  });
}

export { app, httpServer, io };

import type { CommandStatus, CommandUpdateEvent } from '@satsim/shared';
import { Socket, Server as SocketIOServer } from 'socket.io';

let ioInstance: SocketIOServer | null = null;

export const COMMANDS_ROOM = 'commands';

export function commandRoom(commandId: string): string {
  return `command:${commandId}`;
}

export function setupWebSocket(io: SocketIOServer) {
  ioInstance = io;

  io.on('connection', (socket: Socket) => {
    console.log(`[WS] Client connected: ${socket.id}`);

    // Follow a single command
    socket.on('join:command', (commandId: string) => {
      socket.join(commandRoom(commandId));
      console.log(`[WS] ${socket.id} joined ${commandRoom(commandId)}`);
    });

    socket.on('leave:command', (commandId: string) => {
      socket.leave(commandRoom(commandId));
      console.log(`[WS] ${socket.id} left ${commandRoom(commandId)}`);
    });

    // Follow every command (operator console feed)
    socket.on('join:commands', () => {
      socket.join(COMMANDS_ROOM);
      console.log(`[WS] ${socket.id} joined ${COMMANDS_ROOM}`);
    });

    socket.on('leave:commands', () => {
      socket.leave(COMMANDS_ROOM);
      console.log(`[WS] ${socket.id} left ${COMMANDS_ROOM}`);
    });

    socket.on('disconnect', () => {
      console.log(`[WS] Client disconnected: ${socket.id}`);
    });
  });
}

// ─── Broadcast Helpers ───────────────────────────────────────────────────────

export function broadcastCommandUpdate(command: CommandStatus) {
  ioInstance?.to([commandRoom(command.id), COMMANDS_ROOM]).emit('command:update', {
    event: 'command:update',
    command,
  } satisfies CommandUpdateEvent);
}

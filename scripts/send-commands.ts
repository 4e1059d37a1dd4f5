#!/usr/bin/env npx tsx
// ============================================
// Command Sender - Drive the vehicle from a terminal
// ============================================
// Usage: npx tsx scripts/send-commands.ts [serverUrl] [watchSec] <command> [command ...]
// Example: npx tsx scripts/send-commands.ts http://localhost:3000 5 turn_90_left "move_to_coordinates:5,0,5"

import { io } from 'socket.io-client';
import type { CommandResultMessage, VehicleStateMessage } from '#shared';

// ============================================
// Configuration
// ============================================

const SERVER_URL = process.argv[2] || 'http://localhost:3000';
const WATCH_SEC = parseFloat(process.argv[3] || '5');
const COMMANDS = process.argv.slice(4);

// ============================================
// Formatting
// ============================================

function formatState(state: VehicleStateMessage): string {
  const { x, y, z } = state.position;
  return (
    `t=${state.simTimeSeconds.toFixed(2)}s pos=(${x.toFixed(2)}, ${y.toFixed(2)}, ${z.toFixed(2)}) ` +
    `heading=${state.headingDegrees.toFixed(1)}° mode=${state.mode}`
  );
}

function formatResult(result: CommandResultMessage): string {
  const { outcome } = result;
  switch (outcome.status) {
    case 'applied':
      return `✓ ${result.command} -> ${outcome.kind} (mode ${outcome.mode})`;
    case 'rejected':
      return `✗ ${result.command} -> ${outcome.reason}: ${outcome.detail}`;
    case 'unresolved':
      return `? ${result.command} -> nothing in history for ${outcome.target}`;
  }
}

// ============================================
// Main
// ============================================

function main() {
  if (COMMANDS.length === 0) {
    console.error('Usage: send-commands.ts [serverUrl] [watchSec] <command> [command ...]');
    process.exit(1);
  }

  const socket = io(SERVER_URL, {
    transports: ['websocket'],
    reconnection: false,
  });

  let lastState: VehicleStateMessage | null = null;

  socket.on('connect', () => {
    console.log(`Connected to ${SERVER_URL}, sending ${COMMANDS.length} command(s)`);
    socket.emit('command', { command: COMMANDS });
  });

  socket.on('commandResult', (result: CommandResultMessage) => {
    console.log(formatResult(result));
  });

  // Print roughly once per second rather than at the full telemetry rate
  socket.on('vehicleState', (state: VehicleStateMessage) => {
    if (!lastState || Math.floor(state.simTimeSeconds) !== Math.floor(lastState.simTimeSeconds)) {
      console.log(formatState(state));
    }
    lastState = state;
  });

  socket.on('connect_error', (err) => {
    console.error(`Connection error: ${err.message}`);
    process.exit(1);
  });

  setTimeout(() => {
    if (lastState) {
      console.log(`Final: ${formatState(lastState)}`);
    }
    socket.close();
    process.exit(0);
  }, WATCH_SEC * 1000);
}

main();

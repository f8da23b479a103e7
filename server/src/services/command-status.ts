import { CommandState, type CommandStatus, type SatelliteType } from '@satsim/shared';
import type { CommandRecord } from './simulator-store.js';

/**
 * Detached, JSON-safe copy of a command. Call inside the store lock so the
 * copy is consistent. `downloadUrl` assumes the artifact is still on disk;
 * callers verify that after leaving the lock.
 */
export function toCommandStatus(command: CommandRecord, satelliteType: SatelliteType | null): CommandStatus {
  const station = command.requestProfile.groundStation;
  const downloadable = command.state === CommandState.DOWNLINK_READY && command.imagePath !== null;

  return {
    id: command.id,
    satelliteId: command.satelliteId,
    satelliteType,
    groundStationId: station?.id ?? null,
    groundStationName: station?.name ?? null,
    groundStationType: station?.type ?? null,
    missionName: command.missionName,
    aoiName: command.aoiName,
    width: command.width,
    height: command.height,
    cloudPercent: command.cloudPercent,
    failProbability: command.failProbability,
    state: command.state,
    message: command.message,
    createdAt: command.createdAt.toISOString(),
    updatedAt: command.updatedAt.toISOString(),
    downloadUrl: downloadable ? `/api/downloads/${command.id}` : null,
    requestProfile: structuredClone(command.requestProfile),
    acquisitionMetadata: command.acquisitionMetadata ? structuredClone(command.acquisitionMetadata) : null,
    productMetadata: command.productMetadata ? structuredClone(command.productMetadata) : null,
    transitions: command.transitions.map(t => ({ ...t })),
  };
}

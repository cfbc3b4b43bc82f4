import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  DEPTH_SOURCE_TOKEN,
  EVENT_SOURCE_TOKEN,
} from './connector.constants.js';
import { SnapshotConnector } from './snapshot/snapshot.connector.js';

/**
 * Binds the event and depth source tokens. Live venue connectors replace
 * the snapshot by rebinding these two tokens.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    SnapshotConnector,
    { provide: EVENT_SOURCE_TOKEN, useExisting: SnapshotConnector },
    { provide: DEPTH_SOURCE_TOKEN, useExisting: SnapshotConnector },
  ],
  exports: [SnapshotConnector, EVENT_SOURCE_TOKEN, DEPTH_SOURCE_TOKEN],
})
export class ConnectorModule {}

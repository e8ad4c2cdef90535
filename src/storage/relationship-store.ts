// In-memory relationship store. A database-backed store implements the same interface.

import { RelationshipStore } from '../types/collaborators';
import { RelationshipSnapshot } from '../types';
import { createLogger, Logger } from '../utils/logger';

export class InMemoryRelationshipStore implements RelationshipStore {
  private snapshots: Map<string, RelationshipSnapshot> = new Map();
  private logger: Logger = createLogger('relationship-store');

  async read(conversationId: string): Promise<RelationshipSnapshot | null> {
    const snapshot = this.snapshots.get(conversationId);
    return snapshot ? cloneSnapshot(snapshot) : null;
  }

  // Whole-tuple replace
  async write(conversationId: string, snapshot: RelationshipSnapshot): Promise<void> {
    this.snapshots.set(conversationId, cloneSnapshot(snapshot));
    this.logger.debug(
      { conversationId, level: snapshot.relationship_level, stage: snapshot.relationship_stage },
      'Stored relationship snapshot'
    );
  }

  async listConversations(): Promise<string[]> {
    return Array.from(this.snapshots.keys());
  }

  async clear(): Promise<void> {
    this.snapshots.clear();
  }
}

function cloneSnapshot(snapshot: RelationshipSnapshot): RelationshipSnapshot {
  return {
    ...snapshot,
    short_term: snapshot.short_term ? { ...snapshot.short_term } : null
  };
}

/**
 * Parent/Player Link Repository
 *
 * Data access layer for the parent_players join table.
 */

import { PoolClient } from 'pg';

export class ParentPlayerRepository {
  /**
   * Record that a parent is linked to a player
   *
   * Re-linking an existing pair is a no-op.
   *
   * @returns 1 when a new link was stored, 0 when it already existed
   */
  async link(client: PoolClient, parentId: number, playerId: number): Promise<number> {
    const result = await client.query(
      `
      INSERT INTO parent_players (parent_id, player_id)
      VALUES ($1, $2)
      ON CONFLICT (parent_id, player_id) DO NOTHING
      `,
      [parentId, playerId]
    );
    return result.rowCount ?? 0;
  }
}

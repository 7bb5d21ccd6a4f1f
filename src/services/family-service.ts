/**
 * Family Service
 *
 * Links parents to their children (players).
 */

import { transaction } from '../config/database';
import { NotFoundError } from '../models/errors';
import { ParentPlayerRepository } from '../repositories/parent-player-repository';
import { UserRepository } from '../repositories/user-repository';
import { LogLevel, log } from '../utils/logger';

export class FamilyService {
  constructor(
    private userRepository: UserRepository,
    private parentPlayerRepository: ParentPlayerRepository
  ) {}

  /**
   * Link a child to a parent
   *
   * Copies the child's name and email onto the parent and the parent's
   * name and email onto the child, then records the link. All writes
   * share one transaction; linking the same pair again is a no-op.
   *
   * @throws NotFoundError if the child or the parent doesn't exist
   */
  async linkChild(childUsername: string, parentId: number): Promise<void> {
    await transaction('linkChild', async (client) => {
      const child = await this.userRepository.findPlayerByUsername(client, childUsername);
      if (!child) {
        throw new NotFoundError('Child not found');
      }

      const parent = await this.userRepository.findParentById(client, parentId);
      if (!parent) {
        throw new NotFoundError('Parent not found');
      }

      await this.userRepository.setParentChild(client, parent.id, child.name, child.email);
      await this.userRepository.setPlayerParent(client, child.id, parent.name, parent.email);
      const created = await this.parentPlayerRepository.link(client, parent.id, child.id);

      log(LogLevel.INFO, created > 0 ? 'Child linked' : 'Child already linked', {
        operation: 'linkChild',
        parent_id: parent.id,
        player_id: child.id,
      });
    });
  }
}

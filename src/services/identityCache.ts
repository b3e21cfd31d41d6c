import type { ConversationRepository } from "../domain/conversationRepository.js";
import { NotFoundError } from "../domain/errors.js";
import { KeyedMutex } from "../utils/keyedMutex.js";

/**
 * External (Telegram) id → internal user id. Entries are filled on first use
 * and kept for the life of the process.
 */
export class IdentityCache {
  private readonly userIds = new Map<number, string>();

  private readonly locks = new KeyedMutex();

  constructor(private readonly repository: ConversationRepository) {}

  async resolve(externalId: number): Promise<string> {
    const cached = this.userIds.get(externalId);
    if (cached) {
      return cached;
    }

    return this.locks.runExclusive(String(externalId), async () => {
      const existing = this.userIds.get(externalId);
      if (existing) {
        return existing;
      }

      const userId = await this.repository.findUserIdByExternalId(externalId);
      if (!userId) {
        throw new NotFoundError(`User with telegram_id ${externalId} not found`);
      }
      this.userIds.set(externalId, userId);
      return userId;
    });
  }
}

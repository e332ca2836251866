import type { AdminStateRepository } from '../../database/repositories/admin-state.repository.js';
import {
  createAdminState,
  type AdminState,
  type DraftFields,
} from '../../database/models/admin-state.model.js';
import type { ConversationState } from '../../shared/constants/flow-states.js';
import { ValidationError } from '../../shared/errors.js';
import { ConversationStateMachine } from './conversation-state-machine.js';
import { logger } from '../../utils/logger.js';

export type Conversation =
  | { kind: 'absent' }
  | { kind: 'idle'; state: AdminState }
  | { kind: 'active'; state: AdminState; step: ConversationState };

/**
 * Service for per-administrator conversations
 * Every transition is persisted before the caller replies, so a restart resumes at the same step
 */
export class ConversationService {
  constructor(private repository: AdminStateRepository) {}

  load(userId: number): Conversation {
    const lookup = this.repository.get(userId);
    if (!lookup.found) {
      return { kind: 'absent' };
    }

    const { state } = lookup;
    if (state.currentState === null) {
      return { kind: 'idle', state };
    }
    return { kind: 'active', state, step: state.currentState };
  }

  /**
   * Start a workflow from fresh defaults, replacing whatever was stored
   */
  async begin(
    userId: number,
    step: ConversationState,
    fields: Partial<DraftFields> = {}
  ): Promise<AdminState> {
    const state = createAdminState(userId, step, fields);
    await this.repository.save(state);

    logger.debug(`User ${userId} started ${ConversationStateMachine.workflowOf(step)} at ${step}`);
    return state;
  }

  /**
   * Persist a copy of an in-flight state moved to `step`.
   * The stored prompt id is reset unless `changes` sets it.
   */
  async advance(
    state: AdminState,
    step: ConversationState,
    changes: Partial<DraftFields> = {}
  ): Promise<AdminState> {
    if (!ConversationStateMachine.isValidTransition(state.currentState, step)) {
      throw new ValidationError(`Invalid transition ${state.currentState ?? 'idle'} -> ${step}`);
    }

    const next: AdminState = { ...state, lastBotMessageId: 0, ...changes, currentState: step };
    await this.repository.save(next);

    logger.debug(`User ${state.userId} moved ${state.currentState ?? 'idle'} -> ${step}`);
    return next;
  }

  async clear(userId: number): Promise<void> {
    await this.repository.clear(userId);
    logger.debug(`Cleared conversation for user ${userId}`);
  }

  /**
   * Remember the prompt the bot just sent, so the next step can remove it
   */
  async rememberPrompt(userId: number, messageId: number): Promise<void> {
    const updated = await this.repository.rememberPrompt(userId, messageId);
    if (!updated) {
      logger.debug(`No conversation to attach prompt ${messageId} to for user ${userId}`);
    }
  }
}

import {
  ConversationState,
  StartTarget,
  TypeField,
  Workflow,
  type ExpectedInput,
} from '../../shared/constants/flow-states.js';
import { parseStoredState } from '../../database/models/admin-state.model.js';

interface StepDefinition {
  workflow: Workflow;
  expects: ExpectedInput;
  /** Steps reachable from this one without restarting a workflow */
  next: readonly ConversationState[];
  /** Input accepted here commits the workflow */
  final: boolean;
}

const S = ConversationState;

const STEPS: Record<ConversationState, StepDefinition> = {
  [S.NEW_POST_SELECT_TYPE]: {
    workflow: Workflow.NEW_POST,
    expects: 'type_choice',
    next: [S.NEW_POST_ENTER_TEXT],
    final: false,
  },
  [S.NEW_POST_ENTER_TEXT]: {
    workflow: Workflow.NEW_POST,
    expects: 'text',
    next: [S.NEW_POST_CONFIRM],
    final: false,
  },
  [S.NEW_POST_CONFIRM]: { workflow: Workflow.NEW_POST, expects: 'confirmation', next: [], final: true },

  [S.EDIT_POST_ENTER_LINK]: {
    workflow: Workflow.EDIT_POST,
    expects: 'text',
    next: [S.EDIT_POST_ENTER_TEXT],
    final: false,
  },
  [S.EDIT_POST_ENTER_TEXT]: { workflow: Workflow.EDIT_POST, expects: 'text', next: [], final: true },

  [S.DELETE_POST_ENTER_LINK]: { workflow: Workflow.DELETE_POST, expects: 'text', next: [], final: true },

  [S.NEW_TYPE_ENTER_NAME]: {
    workflow: Workflow.NEW_TYPE,
    expects: 'text',
    next: [S.NEW_TYPE_ENTER_EMOJI],
    final: false,
  },
  [S.NEW_TYPE_ENTER_EMOJI]: {
    workflow: Workflow.NEW_TYPE,
    expects: 'text_or_skip',
    next: [S.NEW_TYPE_ENTER_IMAGE],
    final: false,
  },
  [S.NEW_TYPE_ENTER_IMAGE]: {
    workflow: Workflow.NEW_TYPE,
    expects: 'photo_or_skip',
    next: [S.NEW_TYPE_ENTER_TEMPLATE],
    final: false,
  },
  [S.NEW_TYPE_ENTER_TEMPLATE]: { workflow: Workflow.NEW_TYPE, expects: 'text', next: [], final: true },

  // Toggling a type commits straight from the options step
  [S.MANAGE_TYPES]: {
    workflow: Workflow.MANAGE_TYPES,
    expects: 'type_action',
    next: [S.EDIT_TYPE_NAME, S.EDIT_TYPE_EMOJI, S.EDIT_TYPE_IMAGE, S.EDIT_TYPE_TEMPLATE],
    final: true,
  },
  [S.EDIT_TYPE_NAME]: { workflow: Workflow.MANAGE_TYPES, expects: 'text', next: [], final: true },
  [S.EDIT_TYPE_EMOJI]: { workflow: Workflow.MANAGE_TYPES, expects: 'text', next: [], final: true },
  [S.EDIT_TYPE_IMAGE]: { workflow: Workflow.MANAGE_TYPES, expects: 'photo', next: [], final: true },
  [S.EDIT_TYPE_TEMPLATE]: { workflow: Workflow.MANAGE_TYPES, expects: 'text', next: [], final: true },

  [S.EDIT_ADMIN_IDS]: { workflow: Workflow.ACCESS_SETTINGS, expects: 'text', next: [], final: true },
  [S.EDIT_FORUM_ID]: { workflow: Workflow.ACCESS_SETTINGS, expects: 'text', next: [], final: true },
  [S.EDIT_TOPIC_ID]: { workflow: Workflow.ACCESS_SETTINGS, expects: 'text', next: [], final: true },
};

const ENTRY_STATES: Record<StartTarget, ConversationState> = {
  [StartTarget.NEW_POST]: S.NEW_POST_SELECT_TYPE,
  [StartTarget.EDIT_POST]: S.EDIT_POST_ENTER_LINK,
  [StartTarget.DELETE_POST]: S.DELETE_POST_ENTER_LINK,
  [StartTarget.NEW_TYPE]: S.NEW_TYPE_ENTER_NAME,
  [StartTarget.EDIT_ADMIN_IDS]: S.EDIT_ADMIN_IDS,
  [StartTarget.EDIT_FORUM_ID]: S.EDIT_FORUM_ID,
  [StartTarget.EDIT_TOPIC_ID]: S.EDIT_TOPIC_ID,
};

const TYPE_FIELD_STATES: Record<TypeField, ConversationState> = {
  [TypeField.NAME]: S.EDIT_TYPE_NAME,
  [TypeField.EMOJI]: S.EDIT_TYPE_EMOJI,
  [TypeField.IMAGE]: S.EDIT_TYPE_IMAGE,
  [TypeField.TEMPLATE]: S.EDIT_TYPE_TEMPLATE,
};

// Steps that begin a workflow and may be entered from any position
const WORKFLOW_ENTRIES: ReadonlySet<ConversationState> = new Set([
  ...Object.values(ENTRY_STATES),
  S.MANAGE_TYPES,
]);

/**
 * Transition table for admin conversations
 * Every workflow is a short chain of steps ending in a commit or a cancel
 */
export class ConversationStateMachine {
  /**
   * Read a persisted step; '' is idle, anything unknown throws DataIntegrityError
   */
  static parseState(raw: string): ConversationState | null {
    return parseStoredState(raw);
  }

  static workflowOf(state: ConversationState): Workflow {
    return STEPS[state].workflow;
  }

  static expectedInput(state: ConversationState): ExpectedInput {
    return STEPS[state].expects;
  }

  static getNextStates(state: ConversationState): readonly ConversationState[] {
    return STEPS[state].next;
  }

  /**
   * Workflow entry steps are valid from anywhere, including idle.
   * Otherwise only the listed successors are.
   */
  static isValidTransition(from: ConversationState | null, to: ConversationState): boolean {
    if (WORKFLOW_ENTRIES.has(to)) {
      return true;
    }
    return from !== null && STEPS[from].next.includes(to);
  }

  static isFinalStep(state: ConversationState): boolean {
    return STEPS[state].final;
  }

  static entryState(target: StartTarget): ConversationState {
    return ENTRY_STATES[target];
  }

  static typeFieldState(field: TypeField): ConversationState {
    return TYPE_FIELD_STATES[field];
  }
}

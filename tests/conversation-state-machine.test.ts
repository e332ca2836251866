import { ConversationStateMachine } from '../src/core/session/conversation-state-machine.js';
import {
  ConversationState,
  StartTarget,
  TypeField,
  Workflow,
} from '../src/shared/constants/flow-states.js';
import { DataIntegrityError } from '../src/shared/errors.js';

const S = ConversationState;

describe('ConversationStateMachine', () => {
  it('parses stored steps', () => {
    expect(ConversationStateMachine.parseState('')).toBeNull();
    expect(ConversationStateMachine.parseState('new_post_confirm')).toBe(S.NEW_POST_CONFIRM);
    expect(() => ConversationStateMachine.parseState('new_post_review')).toThrow(DataIntegrityError);
  });

  it('walks the new post workflow in order', () => {
    expect(ConversationStateMachine.isValidTransition(null, S.NEW_POST_SELECT_TYPE)).toBe(true);
    expect(ConversationStateMachine.isValidTransition(S.NEW_POST_SELECT_TYPE, S.NEW_POST_ENTER_TEXT)).toBe(true);
    expect(ConversationStateMachine.isValidTransition(S.NEW_POST_ENTER_TEXT, S.NEW_POST_CONFIRM)).toBe(true);
  });

  it('refuses skipped or foreign steps', () => {
    expect(ConversationStateMachine.isValidTransition(S.NEW_POST_SELECT_TYPE, S.NEW_POST_CONFIRM)).toBe(false);
    expect(ConversationStateMachine.isValidTransition(null, S.NEW_POST_ENTER_TEXT)).toBe(false);
    expect(ConversationStateMachine.isValidTransition(S.EDIT_POST_ENTER_LINK, S.NEW_POST_CONFIRM)).toBe(false);
    expect(ConversationStateMachine.isValidTransition(S.NEW_TYPE_ENTER_NAME, S.NEW_TYPE_ENTER_TEMPLATE)).toBe(false);
    expect(ConversationStateMachine.isValidTransition(S.NEW_TYPE_ENTER_NAME, S.NEW_TYPE_ENTER_IMAGE)).toBe(false);
  });

  it('allows entering any workflow from any step', () => {
    expect(ConversationStateMachine.isValidTransition(S.NEW_POST_CONFIRM, S.EDIT_POST_ENTER_LINK)).toBe(true);
    expect(ConversationStateMachine.isValidTransition(S.EDIT_TYPE_NAME, S.MANAGE_TYPES)).toBe(true);
    expect(ConversationStateMachine.isValidTransition(S.EDIT_ADMIN_IDS, S.NEW_TYPE_ENTER_NAME)).toBe(true);
  });

  it('maps steps to workflows and inputs', () => {
    expect(ConversationStateMachine.workflowOf(S.NEW_TYPE_ENTER_IMAGE)).toBe(Workflow.NEW_TYPE);
    expect(ConversationStateMachine.workflowOf(S.EDIT_TOPIC_ID)).toBe(Workflow.ACCESS_SETTINGS);
    expect(ConversationStateMachine.expectedInput(S.NEW_POST_SELECT_TYPE)).toBe('type_choice');
    expect(ConversationStateMachine.expectedInput(S.NEW_TYPE_ENTER_EMOJI)).toBe('text_or_skip');
    expect(ConversationStateMachine.expectedInput(S.NEW_TYPE_ENTER_IMAGE)).toBe('photo_or_skip');
    expect(ConversationStateMachine.expectedInput(S.EDIT_TYPE_IMAGE)).toBe('photo');
    expect(ConversationStateMachine.expectedInput(S.NEW_POST_CONFIRM)).toBe('confirmation');
  });

  it('marks committing steps as final', () => {
    expect(ConversationStateMachine.isFinalStep(S.NEW_POST_CONFIRM)).toBe(true);
    expect(ConversationStateMachine.isFinalStep(S.DELETE_POST_ENTER_LINK)).toBe(true);
    expect(ConversationStateMachine.isFinalStep(S.NEW_POST_ENTER_TEXT)).toBe(false);
    expect(ConversationStateMachine.getNextStates(S.NEW_TYPE_ENTER_NAME)).toEqual([S.NEW_TYPE_ENTER_EMOJI]);
    expect(ConversationStateMachine.getNextStates(S.NEW_TYPE_ENTER_EMOJI)).toEqual([S.NEW_TYPE_ENTER_IMAGE]);
    expect(ConversationStateMachine.getNextStates(S.NEW_TYPE_ENTER_IMAGE)).toEqual([S.NEW_TYPE_ENTER_TEMPLATE]);
  });

  it('resolves entry and field steps', () => {
    expect(ConversationStateMachine.entryState(StartTarget.NEW_POST)).toBe(S.NEW_POST_SELECT_TYPE);
    expect(ConversationStateMachine.entryState(StartTarget.EDIT_FORUM_ID)).toBe(S.EDIT_FORUM_ID);
    expect(ConversationStateMachine.typeFieldState(TypeField.TEMPLATE)).toBe(S.EDIT_TYPE_TEMPLATE);
  });
});

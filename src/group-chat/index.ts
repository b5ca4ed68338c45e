export {
  GroupChat,
  createGroupChat,
  type GroupChatOptions,
  type GroupChatEvent,
  type GroupChatEventListener,
  type ModelSource,
  type ModelFactory,
  type SendOptions,
} from './group-chat.js';
export { ParticipantDirectory } from './participant-directory.js';
export {
  SpeakerSelector,
  DEFAULT_SPEAKER_HINTS,
  ROUTING_PROMPT,
  matchRoutingAnswer,
  fallbackSelection,
  type SpeakerSelection,
  type SelectionStrategy,
  type SpeakerSelectorOptions,
} from './speaker-selector.js';
export {
  summarizeConversation,
  buildTranscript,
  heuristicSummary,
  EMPTY_SUMMARY,
  SUMMARY_PROMPT,
  type SummaryContext,
  type SummaryResult,
  type SummarySource,
} from './summarizer.js';
export {
  ConversationStateMachine,
  InvalidTransitionError,
  type ConversationState,
  type StateTransition,
  type TransitionReason,
} from './conversation-state.js';

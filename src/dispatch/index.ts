export { Dispatcher, DispatcherOptions, TOOL_FAILURE_SPEECH } from './Dispatcher';
export { DispatchResult, DispatchRoute, SpeechSink } from './types';

export { AssistantLoop, AssistantLoopOptions, SubmitOptions, SILENCE_PROMPT, STARTED_MESSAGE } from './AssistantLoop';
export { ConsoleSpeechSource, ConsoleSpeechSink } from './ConsoleSpeech';
export { SpeechEvent, SpeechSource } from './types';

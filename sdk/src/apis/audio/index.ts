export { AudioIsolationAPI } from './AudioIsolationAPI';
export { AudioNativeAPI } from './AudioNativeAPI';
export { DubbingAPI } from './DubbingAPI';
export { ForcedAlignmentAPI } from './ForcedAlignmentAPI';
export { MusicAPI, DEFAULT_MUSIC_MODEL } from './MusicAPI';
export { SoundGenerationAPI } from './SoundGenerationAPI';
export { SpeechToSpeechAPI } from './SpeechToSpeechAPI';
export { SpeechToTextAPI } from './SpeechToTextAPI';
export { TextToDialogueAPI } from './TextToDialogueAPI';
export { TextToSpeechAPI, DEFAULT_OUTPUT_FORMAT, DEFAULT_STREAM_MODEL } from './TextToSpeechAPI';
export { TextToVoiceAPI } from './TextToVoiceAPI';
export { VoicesAPI } from './VoicesAPI';

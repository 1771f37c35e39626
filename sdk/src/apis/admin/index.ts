export { HistoryAPI } from './HistoryAPI';
export { ModelsAPI } from './ModelsAPI';
export { PronunciationDictionariesAPI } from './PronunciationDictionariesAPI';
export { SamplesAPI } from './SamplesAPI';
export { ServiceAccountApiKeysAPI } from './ServiceAccountApiKeysAPI';
export { ServiceAccountsAPI } from './ServiceAccountsAPI';
export { UsageAPI } from './UsageAPI';
export { UserAPI } from './UserAPI';
export { VoiceLibraryAPI } from './VoiceLibraryAPI';
export { WebhooksAPI } from './WebhooksAPI';
export { WorkspaceGroupsAPI } from './WorkspaceGroupsAPI';
export { WorkspaceInvitesAPI } from './WorkspaceInvitesAPI';
export { WorkspaceMembersAPI } from './WorkspaceMembersAPI';
export { WorkspaceResourcesAPI } from './WorkspaceResourcesAPI';

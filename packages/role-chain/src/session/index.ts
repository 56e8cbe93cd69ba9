export {
  ASSUME_ROLE_FROM_PROFILE,
  WEB_IDENTITY_TOKEN_PROFILE,
  createSessionNameGenerator,
  defaultSessionName,
} from './session-name.js';
export type { SessionNamePurpose, SessionNameGenerator } from './session-name.js';

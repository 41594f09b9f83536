import { createOidcProvider } from './base.ts'
import {
  getLinkedInConfig,
  LINKEDIN_AUTH_URL,
  LINKEDIN_SCOPES,
  LINKEDIN_TOKEN_URL,
  LINKEDIN_USERINFO_URL,
} from './linkedin-config.ts'

export const linkedInProvider = createOidcProvider({
  name: 'linkedin',
  authUrl: LINKEDIN_AUTH_URL,
  tokenUrl: LINKEDIN_TOKEN_URL,
  userInfoUrl: LINKEDIN_USERINFO_URL,
  scopes: LINKEDIN_SCOPES,
  getConfig: getLinkedInConfig,
})

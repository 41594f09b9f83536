import { createOidcProvider } from './base.ts'
import {
  GOOGLE_AUTH_URL,
  GOOGLE_SCOPES,
  GOOGLE_TOKEN_URL,
  GOOGLE_USERINFO_URL,
  getGoogleConfig,
} from './google-config.ts'

export const googleProvider = createOidcProvider({
  name: 'google',
  authUrl: GOOGLE_AUTH_URL,
  tokenUrl: GOOGLE_TOKEN_URL,
  userInfoUrl: GOOGLE_USERINFO_URL,
  scopes: GOOGLE_SCOPES,
  getConfig: getGoogleConfig,
  authParams: {
    access_type: 'online',
    prompt: 'select_account',
  },
})

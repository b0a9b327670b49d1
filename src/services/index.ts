import type { NetworkClient } from '../network/network-client.js';
import type { TestHubConfiguration } from '../types.js';
import { AccountLinkingService } from './account-linking-service.js';
import { AuthService } from './auth-service.js';
import { ProfileService } from './profile-service.js';
import { TokenService } from './token-service.js';

export interface TestServices {
  auth: AuthService;
  profile: ProfileService;
  token: TokenService;
  linking: AccountLinkingService;
}

export function createServices(
  client: NetworkClient,
  configuration: TestHubConfiguration,
): TestServices {
  return {
    auth: new AuthService(client, configuration),
    profile: new ProfileService(client),
    token: new TokenService(client),
    linking: new AccountLinkingService(client),
  };
}

import { Credential, ICredentialProvider } from '../../application/types/index';
import { config } from '../../config/index';

/**
 * Reads the credential from TEAMS_CLIENT_ID / TEAMS_CLIENT_SECRET
 */
export class EnvCredentialProvider implements ICredentialProvider {
  private readonly clientId: string;
  private readonly clientSecret: string;

  constructor(clientId: string = config.auth.clientId, clientSecret: string = config.auth.clientSecret) {
    this.clientId = clientId;
    this.clientSecret = clientSecret;
  }

  async get(): Promise<Credential | null> {
    if (!this.clientId || !this.clientSecret) {
      return null;
    }
    return { clientId: this.clientId, clientSecret: this.clientSecret };
  }
}

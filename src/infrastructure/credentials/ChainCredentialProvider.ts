import { Credential, ICredentialProvider } from '../../application/types/index';

/**
 * Asks each provider in turn and returns the first credential found
 */
export class ChainCredentialProvider implements ICredentialProvider {
  private readonly providers: ICredentialProvider[];

  constructor(...providers: ICredentialProvider[]) {
    this.providers = providers;
  }

  async get(): Promise<Credential | null> {
    for (const provider of this.providers) {
      const credential = await provider.get();
      if (credential) {
        return credential;
      }
    }
    return null;
  }
}

/**
 * Credential types shared by the store, the dispatcher and the session layer
 */

export type Credential = {
  accessToken: string;
  refreshToken: string;
  /** Epoch ms the access token is expected to lapse, when the server said so */
  expiresAt: number | null;
};

export interface SessionHooks {
  /** Obtain a fresh credential pair; rejects with an unauthorized error when it cannot */
  renewSession(): Promise<Credential>;
  /** Tear the session down after an authorization failure nothing can recover */
  expireSession(reason: string): Promise<void>;
}

import type {AccessTokenRecord, ConsumeAccessTokenInput, IssueAccessTokenInput} from './contracts';

/**
 * Persistence seam for access tokens. `consumeToken` re-checks every validity
 * clause and records the use in a single atomic step, so two concurrent
 * requests can never both spend the last remaining use.
 */
export type AccessTokenStore = {
  issueToken: (input: IssueAccessTokenInput) => Promise<AccessTokenRecord>;
  getTokenById: (input: {id: string}) => Promise<AccessTokenRecord | null>;
  listTokens: () => Promise<AccessTokenRecord[]>;
  revokeToken: (input: {id: string}) => Promise<AccessTokenRecord>;
  consumeToken: (input: ConsumeAccessTokenInput) => Promise<AccessTokenRecord | null>;
  deleteExpiredOrExhausted: (input: {now: Date}) => Promise<number>;
};

export type AccessTokenStoreOptions = {
  now?: () => Date;
};

export type { IAccountRepository } from "./account-repository.js";
export { InMemoryAccountRepository, normalizeEmail } from "./account-repository.js";
export { DrizzleAccountRepository } from "./drizzle-account-repository.js";
export type { Account, NewAccount } from "./types.js";

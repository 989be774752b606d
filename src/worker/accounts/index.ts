export {
  createAccountService,
  type AccountService,
  type AccountServiceDeps,
  type RankingEntry,
  type RegisterInput,
} from "./service";

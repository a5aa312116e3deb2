export {
  type AccountService,
  AccountServiceImpl,
  createAccountService,
} from './service.js';

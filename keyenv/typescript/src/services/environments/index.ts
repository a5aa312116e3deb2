export {
  type EnvironmentsService,
  EnvironmentsServiceImpl,
  createEnvironmentsService,
} from './service.js';

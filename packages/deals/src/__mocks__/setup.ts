export { server } from './server';
export {
  handlers,
  testFixtures,
  TEST_BASE_URL,
  createRateLimitedHandler,
  createFailingHandler,
} from './handlers';

import { beforeAll, afterEach, afterAll } from 'vitest';
import { server } from './packages/deals/src/__mocks__/server';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// Every request must hit a handler; nothing leaves the process
beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  server.resetHandlers();
  server.events.removeAllListeners();
});

afterAll(() => {
  server.close();
});

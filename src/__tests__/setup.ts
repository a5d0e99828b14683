/**
 * Test Setup Configuration
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'ERROR';

const originalConsole = { ...console };

beforeAll(() => {
  // Logger output is asserted through behaviour, not console text
  console.log = jest.fn();
  console.info = jest.fn();
  console.warn = jest.fn();
  console.error = jest.fn();
});

afterAll(() => {
  Object.assign(console, originalConsole);
});

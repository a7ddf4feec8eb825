import { loggedInRedirect } from './AuthRouter.js';

describe('loggedInRedirect', () => {
  it('adds the logged-in flag under the frontend root', () => {
    expect(loggedInRedirect('http://localhost:5176')).toBe('http://localhost:5176/?logged_in=1');
  });

  it('appends to a frontend URL with a path, trailing slash or not', () => {
    expect(loggedInRedirect('https://app.example.test/portal')).toBe('https://app.example.test/portal/?logged_in=1');
    expect(loggedInRedirect('https://app.example.test/portal/')).toBe('https://app.example.test/portal/?logged_in=1');
  });
});

/**
 * Helpers for toggling log output in test suites. Output is suppressed under
 * NODE_ENV=test unless TOOLRELAY_TEST_LOGS is set.
 */

export const enableTestLogging = (): void => {
  process.env.TOOLRELAY_TEST_LOGS = 'true';
};

export const disableTestLogging = (): void => {
  delete process.env.TOOLRELAY_TEST_LOGS;
};

/**
 * Run `fn` with log output enabled in development format, restoring the
 * previous environment afterwards.
 */
export const withTestLogging = async <T>(fn: () => T | Promise<T>): Promise<T> => {
  const previous = {
    NODE_ENV: process.env.NODE_ENV,
    TOOLRELAY_TEST_LOGS: process.env.TOOLRELAY_TEST_LOGS
  };
  process.env.NODE_ENV = 'development';
  enableTestLogging();
  try {
    return await fn();
  } finally {
    for (const [key, value] of Object.entries(previous)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
};

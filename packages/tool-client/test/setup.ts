// Keeps structured log output out of the test reporter unless TOOLRELAY_TEST_LOGS is set.
process.env.NODE_ENV = 'test';

const setIfMissing = (key: string, value: string) => {
  if (!process.env[key]) {
    process.env[key] = value;
  }
};

setIfMissing('NODE_ENV', 'test');
// Keep component logs out of the test output unless asked for
setIfMissing('TETHER_LOG_LEVEL', 'ERROR');

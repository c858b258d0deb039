export const config = {
  // Used when the connection URI is not given on the command line.
  databaseUrl: process.env.DATABASE_URL || undefined,
  logLevel: process.env.LOG_LEVEL || 'info',
};

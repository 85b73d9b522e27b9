export type AppEnv = { Variables: { dataDir: string } };

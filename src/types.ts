// Hono context variables shared by the middleware and routes
export type AppEnv = {
  Variables: {
    reqId: string;
    apiKey: string | undefined;
  };
};

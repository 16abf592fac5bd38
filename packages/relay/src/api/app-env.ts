/** Hono environment shared by the relay's routers and middleware. */
export interface AppEnv {
  Variables: {
    requestId: string;
  };
}

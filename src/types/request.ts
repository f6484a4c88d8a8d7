export interface RequestContext {
  startTime: bigint;
}

declare module "fastify" {
  interface FastifyRequest {
    requestContext?: RequestContext;
  }
}

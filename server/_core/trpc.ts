import { initTRPC, TRPCError } from "@trpc/server";
import superjson from "superjson";
import type { TrpcContext } from "./context";

const UNAUTHED_ERR_MSG = "Please sign in to a company account (10001)";
const NOT_ADMIN_ERR_MSG = "You do not have required permission (10002)";

const t = initTRPC.context<TrpcContext>().create({
  transformer: superjson,
});

export const router = t.router;
export const publicProcedure = t.procedure;
export const createCallerFactory = t.createCallerFactory;

const requireCompany = t.middleware(async opts => {
  const { ctx, next } = opts;

  if (!ctx.company) {
    throw new TRPCError({ code: "UNAUTHORIZED", message: UNAUTHED_ERR_MSG });
  }

  return next({
    ctx: {
      ...ctx,
      company: ctx.company,
    },
  });
});

export const protectedProcedure = t.procedure.use(requireCompany);

export const adminProcedure = t.procedure.use(
  t.middleware(async opts => {
    const { ctx, next } = opts;

    if (!ctx.company || ctx.company.role !== "admin") {
      throw new TRPCError({ code: "FORBIDDEN", message: NOT_ADMIN_ERR_MSG });
    }

    return next({
      ctx: {
        ...ctx,
        company: ctx.company,
      },
    });
  }),
);

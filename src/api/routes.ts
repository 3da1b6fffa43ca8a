import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import { settings } from "../core/config";
import { errorMessage } from "../core/errors";
import type { Signal } from "../types/models";
import {
  auditQuerySchema,
  killSwitchRequestSchema,
  policyPatchSchema,
  positionsQuerySchema,
  recentQuerySchema,
  sessionResetRequestSchema,
  signalSchema
} from "../types/schemas";

const recentSignals = (app: FastifyInstance, limit: number): Signal[] => {
  const signals: Signal[] = [];
  for (const record of app.services.auditStore.listAuditRecords({ eventTypes: ["signal_emitted"], limit })) {
    const parsed = signalSchema.safeParse(record.payload.signal);
    if (parsed.success) signals.push(parsed.data);
  }
  return signals;
};

export const registerRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/health", async () => ({ status: "ok", timestamp: new Date().toISOString() }));

  app.get("/run-status", async () => {
    const { scanner, sessionSupervisor } = app.services;
    return {
      brokerMode: settings.brokerMode,
      broker: app.services.broker.name,
      scanner: scanner.status(),
      sessionSupervisor: sessionSupervisor.getRuntimeStatus()
    };
  });

  app.get("/risk-status", async () => ({
    riskState: app.services.riskEngine.getRiskState(),
    reservations: app.services.riskEngine.listReservations(),
    killSwitch: app.services.riskEngine.getKillSwitchState()
  }));

  app.get("/kill-switch", async () => ({
    killSwitch: app.services.riskEngine.getKillSwitchState()
  }));

  app.post("/kill-switch", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = killSwitchRequestSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }
    return { killSwitch: app.services.riskEngine.setKillSwitch(body.data.enabled) };
  });

  app.get("/positions", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = positionsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    return {
      live: app.services.dispatcher.listPositions(),
      positions: app.services.auditStore.listPositions(query.data)
    };
  });

  app.get("/signals/recent", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = recentQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    return { signals: recentSignals(app, query.data.limit) };
  });

  app.get("/audit/recent", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = auditQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    return {
      records: app.services.auditStore.listAuditRecords({
        eventTypes: query.data.eventTypes,
        limit: query.data.limit
      })
    };
  });

  app.get("/bot-policy", async () => ({
    policy: app.services.runtimePolicy.getPolicy(),
    guidelines: app.services.runtimePolicy.getGuidelines()
  }));

  app.patch("/bot-policy", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = policyPatchSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }

    const updated = app.services.runtimePolicy.updatePolicy(body.data);
    app.services.auditStore.logEvent("bot_policy_updated", { policy: updated });
    return {
      policy: updated,
      guidelines: app.services.runtimePolicy.getGuidelines()
    };
  });

  app.post("/bot-policy/reset", async () => {
    const reset = app.services.runtimePolicy.resetPolicy();
    app.services.auditStore.logEvent("bot_policy_reset", { policy: reset });
    return {
      policy: reset,
      guidelines: app.services.runtimePolicy.getGuidelines()
    };
  });

  app.post("/scanner/start", async (_request: FastifyRequest, reply: FastifyReply) => {
    const { scanner } = app.services;
    if (scanner.isRunning()) return { started: false, status: scanner.status() };
    try {
      await scanner.start();
    } catch (error) {
      return reply.code(503).send({ error: errorMessage(error) });
    }
    return { started: true, status: scanner.status() };
  });

  app.post("/scanner/stop", async () => {
    const { scanner } = app.services;
    if (!scanner.isRunning()) return { stopped: false, status: scanner.status() };
    await scanner.stop();
    return { stopped: true, status: scanner.status() };
  });

  app.post("/session/reset", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = sessionResetRequestSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }

    const result = await app.services.resetSession(body.data);
    if (!result.reset) {
      return reply.code(409).send({
        error: `${result.openPositions} position(s) still open; pass force to square off`,
        riskState: result.riskState
      });
    }
    return result;
  });
};

import type { FastifyInstance } from "fastify";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<{ status: string; details?: string }> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
}

async function getClientModules(): Promise<ClientLifecycleModules> {
  const openaiModule = await import("./openai.js");
  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient
  };
}

async function shutdownAllClients(logPrefix: string, loadClientModules: () => Promise<ClientLifecycleModules>): Promise<void> {
  const clients = await loadClientModules();
  console.info(`${logPrefix} shutting down infrastructure clients`);
  await clients.shutdownOpenAIClient();
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

/**
 * With ENABLE_INFRA_BOOTSTRAP=true the model client is created and health checked
 * before the server accepts requests, and released on close or SIGINT/SIGTERM.
 */
export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? process.env.ENABLE_INFRA_BOOTSTRAP === "true";
  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const loadClientModules = options?.loadClientModules ?? getClientModules;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClientModules();
    const openai = await clients.getOpenAIClient();
    const health = await openai.healthCheck();
    if (health.status !== "ok") {
      throw new Error(`OpenAI client health check failed: ${health.details ?? "unknown error"}`);
    }
    app.log.info("Infrastructure singletons initialized and health checked");
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("[lifecycle/onClose]", loadClientModules);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      console.info(`[lifecycle/process] received ${signal}`);
      await shutdownAllClients("[lifecycle/process]", loadClientModules);
      exit(0);
    };

    process.once("SIGINT", async () => {
      await handleSignal("SIGINT");
    });
    process.once("SIGTERM", async () => {
      await handleSignal("SIGTERM");
    });
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}

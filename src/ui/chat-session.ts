import type { AgentInvocationClient } from "../agent/client.js";
import type { AgentChunk } from "../agent/types.js";
import { InvocationCancelled, SessionExpiredError, TokenRejectedError } from "../errors.js";
import { CredentialStore } from "../identity/credential-store.js";
import { buildContext } from "../identity/propagation.js";
import { TokenLifecycleManager, type TokenManagerOptions } from "../identity/token-manager.js";
import type { IdentityProvider, Session } from "../identity/types.js";
import type { Logger } from "../logging/logger.js";
import type { ToolResult } from "../tools/types.js";
import { greeting } from "./quick-queries.js";

export interface ChatMessage {
  readonly role: "user" | "assistant";
  readonly content: string;
  readonly at: number;
}

export interface AskOptions {
  readonly signal?: AbortSignal;
  readonly onChunk?: (chunk: AgentChunk) => void;
}

export interface AskOutcome {
  readonly status: "answered" | "cancelled";
  readonly text: string;
  readonly toolResults: readonly ToolResult[];
}

/**
 * One user's conversation. Owns that user's credential store, so several
 * ChatSessions in one process never share tokens.
 */
export class ChatSession {
  readonly store = new CredentialStore();
  private readonly tokens: TokenLifecycleManager;
  private readonly messages: ChatMessage[] = [];
  private inFlight: AbortController | null = null;

  constructor(
    provider: IdentityProvider,
    private readonly agent: AgentInvocationClient,
    private readonly logger: Logger,
    tokenOptions: TokenManagerOptions,
  ) {
    this.tokens = new TokenLifecycleManager(provider, this.store, logger, tokenOptions);
  }

  get session(): Session | null {
    return this.store.active();
  }

  get needsLogin(): boolean {
    return this.store.active() === null;
  }

  history(): readonly ChatMessage[] {
    return this.messages;
  }

  async login(username: string, password: string): Promise<Session> {
    const session = await this.tokens.login(username, password);
    this.messages.length = 0;
    this.messages.push({ role: "assistant", content: greeting(session.displayName), at: Date.now() });
    return session;
  }

  async ask(message: string, options: AskOptions = {}): Promise<AskOutcome> {
    const session = this.store.active();
    if (!session) throw new SessionExpiredError("Not logged in");

    await this.tokens.ensureValid(session);
    const context = buildContext(session);
    const askedAt = Date.now();

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    this.inFlight = controller;

    const texts: string[] = [];
    const toolResults: ToolResult[] = [];
    try {
      const response = await this.agent.invoke(message, context, { stream: true, signal: controller.signal });
      for await (const chunk of response) {
        options.onChunk?.(chunk);
        if (chunk.type === "text") texts.push(chunk.text);
        if (chunk.type === "tool_result") toolResults.push(chunk.result);
        if (chunk.type === "error") texts.push(`Error: ${chunk.message}`);
      }
    } catch (err) {
      if (err instanceof InvocationCancelled) {
        this.logger.debug({ userId: session.userId }, "Question cancelled");
        return { status: "cancelled", text: texts.join("\n"), toolResults };
      }
      if (err instanceof TokenRejectedError) {
        await this.logout();
      }
      throw err;
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      if (this.inFlight === controller) this.inFlight = null;
    }

    const text = texts.join("\n");
    // Only answered exchanges enter the history.
    this.messages.push(
      { role: "user", content: message, at: askedAt },
      { role: "assistant", content: text, at: Date.now() },
    );
    return { status: "answered", text, toolResults };
  }

  /** Stops the answer in progress. The session stays logged in. */
  cancel(): void {
    this.inFlight?.abort();
  }

  async logout(): Promise<void> {
    this.inFlight?.abort();
    const session = this.store.active();
    if (session) await this.tokens.logout(session);
    this.messages.length = 0;
  }
}

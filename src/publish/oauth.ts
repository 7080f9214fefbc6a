import crypto from "node:crypto";
import fs from "node:fs/promises";
import Fastify from "fastify";
import { fetch } from "undici";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { AuthorizationError, errorMessage } from "../errors.js";
import { GOOGLE_AUTH_URL, GOOGLE_TOKEN_URL } from "../constants.js";
import { OAuthSession } from "./session.js";

export interface Authorizer {
  authorize(): Promise<OAuthSession>;
}

const ClientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url().optional(),
});

// Google's downloaded client file nests the client under "installed" or "web"
const ClientSecretsSchema = z.union([
  z.object({ installed: ClientSchema }).transform((v) => v.installed),
  z.object({ web: ClientSchema }).transform((v) => v.web),
]);

type OAuthClient = z.infer<typeof ClientSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

const CallbackQuerySchema = z.object({
  state: z.string().optional(),
  code: z.string().optional(),
  error: z.string().optional(),
});

export interface LoopbackAuthorizerOptions {
  clientSecretsPath: string;
  scopes: string[];
  /** 0 picks a free port. */
  port: number;
  timeoutMs: number;
  log: Logger;
  /** Called with the consent URL once the redirect listener is up. */
  onAuthorizationUrl?: (url: string) => void;
  authUrl?: string;
  tokenUrl?: string;
  now?: () => number;
}

/**
 * Installed-app OAuth flow: a throwaway listener on 127.0.0.1 catches the
 * redirect, the code is exchanged once and nothing is written to disk.
 */
export class LoopbackAuthorizer implements Authorizer {
  private readonly log: Logger;

  constructor(private readonly opts: LoopbackAuthorizerOptions) {
    this.log = opts.log.child({ component: "oauth" });
  }

  async authorize(): Promise<OAuthSession> {
    const client = await this.loadClient();
    const state = crypto.randomBytes(16).toString("hex");
    const verifier = crypto.randomBytes(32).toString("base64url");
    const challenge = crypto.createHash("sha256").update(verifier).digest("base64url");

    let finished = false;
    let resolveGrant: (code: string) => void = () => {};
    let rejectGrant: (err: Error) => void = () => {};
    const grant = new Promise<string>((resolve, reject) => {
      resolveGrant = resolve;
      rejectGrant = reject;
    });

    const listener = Fastify({ logger: false });
    listener.get("/oauth2callback", async (req, reply) => {
      const query = CallbackQuerySchema.safeParse(req.query);
      if (finished || !query.success || query.data.state !== state) {
        return reply.code(400).type("text/html").send("<p>Unknown or expired authorization request.</p>");
      }
      if (query.data.error || !query.data.code) {
        rejectGrant(
          new AuthorizationError(
            "denied",
            `Authorization was not granted: ${query.data.error ?? "no code returned"}`
          )
        );
        return reply.type("text/html").send("<p>Authorization denied. You can close this window.</p>");
      }
      resolveGrant(query.data.code);
      return reply.type("text/html").send("<p>Authorization complete. You can close this window.</p>");
    });

    let timer: NodeJS.Timeout | undefined;
    try {
      try {
        await listener.listen({ port: this.opts.port, host: "127.0.0.1" });
      } catch (err) {
        throw new AuthorizationError("listener", `Could not start OAuth redirect listener: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      const address = listener.server.address();
      const port = typeof address === "object" && address !== null ? address.port : this.opts.port;
      const redirectUri = `http://127.0.0.1:${port}/oauth2callback`;

      const consentUrl = this.buildConsentUrl(client, redirectUri, state, challenge);
      this.log.info({ url: consentUrl, timeoutMs: this.opts.timeoutMs }, "Waiting for OAuth consent");
      this.opts.onAuthorizationUrl?.(consentUrl);

      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(
            new AuthorizationError("timeout", `Authorization not completed within ${this.opts.timeoutMs}ms`)
          );
        }, this.opts.timeoutMs);
      });

      const code = await Promise.race([grant, timeout]);
      return await this.exchangeCode(client, code, redirectUri, verifier);
    } finally {
      finished = true;
      clearTimeout(timer);
      await listener.close();
    }
  }

  private async loadClient(): Promise<OAuthClient> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.opts.clientSecretsPath, "utf-8"));
    } catch (err) {
      throw new AuthorizationError(
        "client_secrets",
        `Could not read OAuth client file ${this.opts.clientSecretsPath}`,
        { cause: err }
      );
    }
    const parsed = ClientSecretsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthorizationError("client_secrets", "OAuth client file has no installed/web client");
    }
    return parsed.data;
  }

  private buildConsentUrl(
    client: OAuthClient,
    redirectUri: string,
    state: string,
    challenge: string
  ): string {
    const url = new URL(this.opts.authUrl ?? client.auth_uri ?? GOOGLE_AUTH_URL);
    url.searchParams.set("client_id", client.client_id);
    url.searchParams.set("redirect_uri", redirectUri);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("scope", this.opts.scopes.join(" "));
    url.searchParams.set("access_type", "online");
    url.searchParams.set("prompt", "consent");
    url.searchParams.set("state", state);
    url.searchParams.set("code_challenge", challenge);
    url.searchParams.set("code_challenge_method", "S256");
    return url.toString();
  }

  private async exchangeCode(
    client: OAuthClient,
    code: string,
    redirectUri: string,
    verifier: string
  ): Promise<OAuthSession> {
    const tokenUrl = this.opts.tokenUrl ?? client.token_uri ?? GOOGLE_TOKEN_URL;
    let body: unknown;
    try {
      const res = await fetch(tokenUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          code,
          client_id: client.client_id,
          client_secret: client.client_secret,
          redirect_uri: redirectUri,
          grant_type: "authorization_code",
          code_verifier: verifier,
        }),
      });
      if (!res.ok) {
        throw new Error(`token endpoint returned ${res.status} ${await res.text()}`);
      }
      body = await res.json();
    } catch (err) {
      throw new AuthorizationError("token_exchange", `Token exchange failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const token = TokenResponseSchema.safeParse(body);
    if (!token.success) {
      throw new AuthorizationError("token_exchange", "Token endpoint returned no access token");
    }
    const scopes = token.data.scope ? token.data.scope.split(" ") : this.opts.scopes;
    const missing = this.opts.scopes.filter((s) => !scopes.includes(s));
    if (missing.length > 0) {
      throw new AuthorizationError("token_exchange", `Scopes not granted: ${missing.join(", ")}`);
    }

    const now = this.opts.now ?? Date.now;
    const expiresAt = new Date(now() + (token.data.expires_in ?? 3600) * 1000);
    this.log.info({ scopes, expiresAt: expiresAt.toISOString() }, "OAuth session authorized");
    return new OAuthSession(client.client_id, token.data.access_token, scopes, expiresAt);
  }
}

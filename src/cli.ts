#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { AuthError, describeCredentials } from "./auth/types.js";
import { loadConfig } from "./lakegate/config.js";
import { toLakegateError } from "./lakegate/errors.js";
import { createGateway } from "./lakegate/gateway.js";
import type { Gateway } from "./lakegate/gateway.js";
import { describeState, startHttpServer } from "./server/http.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,
  DENIED: 10,      // Authorization decision was a deny
  AUTH_ERROR: 20,  // Token rejected
  ERROR: 30        // Configuration or unexpected failure
} as const;

function gatewayFromEnv(overrides: { port?: string } = {}): Gateway {
  const env = { ...process.env };
  if (overrides.port !== undefined) {
    env.LAKEGATE_PORT = overrides.port;
  }
  return createGateway(loadConfig(env));
}

function fail(err: unknown): never {
  if (err instanceof AuthError) {
    process.stderr.write(chalk.red(`✗ [${err.code}] ${err.message}\n`));
    process.stderr.write(chalk.dim(`  ${err.remediation}\n`));
    process.exit(EXIT_CODES.AUTH_ERROR);
  }
  const lakegateErr = toLakegateError(err);
  process.stderr.write(chalk.red(`Error: [${lakegateErr.code}] ${lakegateErr.message}\n`));
  process.exit(EXIT_CODES.ERROR);
}

const program = new Command();

program.name("lakegate").description("Token validation and bucket authorization gateway").version("0.1.0");

program
  .command("serve")
  .description("Run the HTTP server")
  .option("--port <port>", "Port (defaults to LAKEGATE_PORT or 8765)")
  .action((opts: { port?: string }) => {
    let gateway: Gateway;
    try {
      gateway = gatewayFromEnv(opts);
    } catch (err) {
      fail(err);
    }
    const server = startHttpServer(gateway);

    const shutdown = (signal: string) => {
      process.stderr.write(chalk.yellow(`\nReceived ${signal}, shutting down...\n`));
      server.close().then(
        () => process.exit(EXIT_CODES.OK),
        (err: unknown) => fail(err)
      );
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  });

program
  .command("inspect")
  .description("Validate a token and print its expanded claims")
  .argument("<token>", "Bearer token")
  .option("--json", "Output JSON", false)
  .action(async (token: string, opts: { json: boolean }) => {
    try {
      const gateway = gatewayFromEnv();
      const { claims, keyId } = await gateway.validator.validate(token);
      const { credentials, ...rest } = claims;
      const view = { ...rest, credentials: credentials ? describeCredentials(credentials) : null };
      if (opts.json) {
        process.stdout.write(JSON.stringify({ keyId: keyId ?? null, claims: view }, null, 2) + "\n");
        return;
      }
      process.stderr.write(chalk.green(`✓ Valid token for ${claims.subject}\n`));
      process.stderr.write(chalk.dim(`  Level: ${claims.level}\n`));
      process.stderr.write(chalk.dim(`  Expires: ${new Date(claims.expiresAt * 1000).toISOString()}\n`));
      process.stderr.write(chalk.dim(`  Permissions: ${claims.permissions.join(", ") || "(none)"}\n`));
      process.stderr.write(chalk.dim(`  Buckets: ${claims.resources.join(", ") || "(none)"}\n`));
      if (claims.assumableRole !== undefined) {
        process.stderr.write(chalk.dim(`  Role: ${claims.assumableRole}\n`));
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("check")
  .description("Decide whether an operation is allowed")
  .argument("<operation>", "Operation name, e.g. bucket_objects_list")
  .argument("[bucket]", "Bucket the operation targets")
  .option("--token <token>", "Bearer token (defaults to the ambient identity)")
  .action(async (operation: string, bucket: string | undefined, opts: { token?: string }) => {
    try {
      const gateway = gatewayFromEnv();
      const state = await gateway.authenticator.authenticate(
        opts.token !== undefined ? { authorization: `Bearer ${opts.token}` } : {}
      );
      const decision = await gateway.context.run(state, () =>
        gateway.engine.authorize(operation, bucket, gateway.context.current())
      );
      if (decision.allowed) {
        process.stderr.write(chalk.green(`✓ ${decision.message}\n`));
        process.exit(EXIT_CODES.OK);
      }
      process.stderr.write(chalk.red(`✗ ${decision.message} (${decision.reason})\n`));
      if (decision.remediation !== undefined) {
        process.stderr.write(chalk.dim(`  ${decision.remediation}\n`));
      }
      process.exit(EXIT_CODES.DENIED);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("status")
  .description("Show the identity a request would run as")
  .option("--token <token>", "Bearer token (defaults to the ambient identity)")
  .action(async (opts: { token?: string }) => {
    try {
      const gateway = gatewayFromEnv();
      const state = await gateway.authenticator.authenticate(
        opts.token !== undefined ? { authorization: `Bearer ${opts.token}` } : {}
      );
      process.stdout.write(JSON.stringify(describeState(state), null, 2) + "\n");
    } catch (err) {
      fail(err);
    }
  });

program
  .command("operations")
  .description("List operations and the permissions they require")
  .action(() => {
    try {
      const gateway = gatewayFromEnv();
      for (const op of gateway.engine.listOperations()) {
        const resource = op.resource === "none" ? "" : chalk.dim(` [${op.resource}]`);
        process.stdout.write(`${chalk.bold(op.operation)}${resource}\n`);
        process.stdout.write(chalk.dim(`  ${op.permissions.join(", ")}\n`));
      }
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync(process.argv);

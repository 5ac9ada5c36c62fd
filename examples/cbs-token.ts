/**
 * Prints the endpoints, basic-auth identity and CBS token expiry for the
 * connection string in IOTHUB_CONNECTION_STRING.
 *
 * IOTHUB_CONNECTION_STRING="HostName=my-hub.azure-devices.net;DeviceId=dev1;SharedAccessKey=..." \
 *   npx tsx examples/cbs-token.ts
 */

import { CredentialContext, createLogger } from "../src/index.js";

const logger = createLogger({ level: "info" });
const context = CredentialContext.fromEnv({ logger });

logger.info(
	{
		httpsEndpoint: context.httpsEndpoint.href,
		amqpEndpoint: context.amqpEndpoint.href,
		eventsLink: context.buildLinkAddress("/messages/events").href,
		user: context.getUser(),
	},
	"Resolved connection",
);

const token = await context.getToken(context.amqpEndpoint, context.audience, ["put"]);
logger.info({ type: token.type, expiresAt: token.expiresAt.toISOString() }, "CBS token ready");

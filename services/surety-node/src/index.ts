import { logger } from "../../../libs/logging/logger.js";
import { loadSuretyConfig } from "../../../libs/bootstrap/config/surety-config.js";
import { FlightSuretyCore } from "../../../libs/surety/flightSuretyCore.js";
import { SuretyGateway } from "../../../libs/surety/suretyGateway.js";
import { InMemoryValueTransfer } from "../../../libs/ledger/transfers.js";
import { NotificationOutbox } from "../../../libs/events/notifications.js";
import { NotificationRelay } from "../../../libs/outbox/NotificationRelay.js";
import { createJournalPool } from "../../../libs/db/pool.js";

async function main() {
    const config = loadSuretyConfig();
    logger.level = config.logLevel;

    const outbox = new NotificationOutbox(config.journalEnabled);
    const core = new FlightSuretyCore({
        owner: config.ownerId,
        firstAirline: config.firstAirlineId,
        transfers: new InMemoryValueTransfer(),
        outbox
    });

    // The gateway is the only authorized invoker of the core.
    const gateway = SuretyGateway.attach(core, config.gatewayId, config.ownerId);

    outbox.subscribe(({ sequence, notification }) => {
        logger.debug({ sequence, type: notification.type }, "Notification published");
    });

    let relay: NotificationRelay | null = null;
    if (config.journalEnabled) {
        const pool = createJournalPool();
        relay = new NotificationRelay(pool, outbox);
        await relay.ensureSchema();
        relay.start(config.journalFlushMs);

        const shutdown = async () => {
            logger.info("Shutting down surety node");
            await relay?.stop();
            await pool.end();
            process.exit(0);
        };
        const onSignal = () => {
            shutdown().catch(err => {
                logger.fatal(err);
                process.exit(1);
            });
        };
        process.once("SIGINT", onSignal);
        process.once("SIGTERM", onSignal);
    }

    logger.info({
        gateway: gateway.invokerId,
        operational: gateway.isOperational(),
        registeredAirlines: gateway.getRegisteredAirlineCount(),
        journal: config.journalEnabled
    }, "Surety node initialized");
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});

import type { IListenerConfig, SubscriptionConfig } from '../config/interfaces/IListenerConfig.js';
import { Logger } from '../logger/Logger.js';
import { NotificationDispatcher } from '../notifications/dispatcher/NotificationDispatcher.js';
import { NotificationError } from '../notifications/errors/NotificationErrors.js';
import type { RenderedView } from '../notifications/renderer/PayloadRenderer.js';
import type { ITransportConnector } from '../notifications/transport/ITransport.js';
import { toSubscriptionFilter } from '../zeromq/enums/BitcoinZeroMQTopic.js';
import { ZeroMQConnector } from '../zeromq/ZeroMQTransport.js';

export type LinePrinter = (line: string) => void;

export function formatView(view: RenderedView): string {
    return `${view.topic} #${view.sequence} ${view.text}`;
}

/**
 * Runs one dispatcher per configured subscription and prints every notification.
 * The first connection failure stops every other subscription.
 */
export class ZeroMQListener extends Logger {
    public readonly logColor: string = '#1553c7';

    private readonly controller: AbortController = new AbortController();
    private readonly dispatchers: NotificationDispatcher[] = [];

    private readonly connector: ITransportConnector;
    private readonly print: LinePrinter;

    constructor(
        private readonly config: IListenerConfig,
        connector?: ITransportConnector,
        print?: LinePrinter,
    ) {
        super();

        this.connector =
            connector ??
            new ZeroMQConnector({
                receiveHighWaterMark: config.ZEROMQ.RECEIVE_HIGH_WATER_MARK,
            });

        this.print = print ?? ((line: string) => this.info(line));
    }

    /**
     * Resolves with the process exit code once every subscription has ended.
     */
    public async start(): Promise<number> {
        Logger.setDebugLevel(this.config.DEBUG_LEVEL);

        this.log(`Starting ${this.config.SUBSCRIPTIONS.length} subscription(s)...`);

        const results = await Promise.allSettled(
            this.config.SUBSCRIPTIONS.map((subscription) => this.listen(subscription)),
        );

        const failures = results.filter((result) => result.status === 'rejected');
        if (failures.length > 0) {
            return 1;
        }

        this.success('All subscriptions stopped.');
        return 0;
    }

    public stop(): void {
        this.controller.abort();
    }

    public getDispatchers(): readonly NotificationDispatcher[] {
        return this.dispatchers;
    }

    private async listen(subscription: SubscriptionConfig): Promise<void> {
        const dispatcher = new NotificationDispatcher({
            renderMode: this.config.RENDER_MODE,
            gapDetection: this.config.SEQUENCE.GAP_DETECTION,
            resetOnReconnect: this.config.SEQUENCE.RESET_ON_RECONNECT,
            sequencePolicy: { wrapAround: this.config.SEQUENCE.WRAP_AROUND },
        });

        this.dispatchers.push(dispatcher);

        try {
            await dispatcher.run({
                connector: this.connector,
                endpoint: subscription.ENDPOINT,
                topicFilter: toSubscriptionFilter(subscription.TOPIC),
                onRecord: (_record, view) => this.print(formatView(view)),
                signal: this.controller.signal,
            });
        } catch (e: unknown) {
            const reason = e instanceof NotificationError ? `${e.code}: ${e.message}` : String(e);
            this.panic(`Subscription ${subscription.TOPIC} on ${subscription.ENDPOINT} ended. ${reason}`);

            this.stop();
            throw e;
        }
    }
}

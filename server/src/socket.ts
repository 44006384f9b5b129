import type { IncomingMessage, Server } from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { silentLogger, type Logger } from "./logger";
import type { SensorRegistry } from "./sensors/registry";
import type { SensorThing } from "./sensors/thing";
import type { SensorValue } from "./sensors/types";

export const UNKNOWN_THING_CLOSE_CODE = 4404;

export type PropertyStatusMessage = {
    messageType: "propertyStatus";
    id: string;
    data: Record<string, SensorValue>;
};

function send(socket: WebSocket, message: PropertyStatusMessage) {
    if (socket.readyState === WebSocket.OPEN) {
        socket.send(JSON.stringify(message));
    }
}

function requestedThing(req: IncomingMessage): string | null {
    const url = new URL(req.url ?? "/", "http://localhost");
    return url.searchParams.get("thing");
}

/**
 * Push property changes to WebSocket clients on /ws. A client may narrow
 * the feed to one thing with ?thing=<id>.
 */
export function attachThingSocket(server: Server, registry: SensorRegistry, logger: Logger = silentLogger) {
    const log = logger.child({ module: "ws" });
    const wss = new WebSocketServer({ server, path: "/ws" });

    wss.on("connection", (socket, req) => {
        const filter = requestedThing(req);
        let things: SensorThing[];
        if (filter === null) {
            things = registry.things();
        } else {
            const thing = registry.get(filter);
            if (!thing) {
                socket.close(UNKNOWN_THING_CLOSE_CODE, "Thing not found");
                return;
            }
            things = [thing];
        }

        const unsubscribers = things.map((thing) =>
            thing.subscribe((property, value) => {
                try {
                    send(socket, { messageType: "propertyStatus", id: thing.id, data: { [property]: value } });
                } catch (err) {
                    log.error({ err }, "WS broadcast error");
                }
            }),
        );

        socket.on("close", () => {
            for (const unsubscribe of unsubscribers) unsubscribe();
        });
        socket.on("error", (err) => {
            log.warn({ err }, "WS client error");
        });

        for (const thing of things) {
            send(socket, { messageType: "propertyStatus", id: thing.id, data: thing.getValues() });
        }
    });

    wss.on("error", (err) => {
        log.error({ err }, "WS server error");
    });

    return {
        clients: () => wss.clients.size,
        close: () =>
            new Promise<void>((resolve, reject) => {
                for (const client of wss.clients) client.terminate();
                wss.close((err) => (err ? reject(err) : resolve()));
            }),
    };
}

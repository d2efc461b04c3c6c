import dotenv from "dotenv";
import path from "path";
import { loadConfig } from "../server/config";
import { createAxiosTransport } from "../server/lib/http";
import { NextArrivalClient } from "../server/lib/next-arrival-client";
import { adjustLegTime } from "../server/lib/time-adjuster";
import { describeError } from "../server/lib/errors";

// Load environment variables
dotenv.config({ path: path.join(process.cwd(), ".env") });

// Usage: npm run check:next -- "Suburban Station" "Paoli" [count]
async function checkNextToArrive() {
    const [start, end, count] = process.argv.slice(2);
    if (!start || !end) {
        console.error("❌ Usage: check-next-to-arrive <start> <end> [count]");
        process.exitCode = 1;
        return;
    }

    const config = loadConfig();
    const client = new NextArrivalClient(createAxiosTransport(config.requestTimeoutMs), config.nextToArriveUrl);
    const n = count ? parseInt(count, 10) : config.boardArrivalCount;

    console.log(`fetching next ${n} trains ${start} -> ${end}...`);

    try {
        const arrivals = await client.fetch(start, end, n);
        if (arrivals.length === 0) {
            console.log("✅ No upcoming trains.");
            return;
        }

        for (const arrival of arrivals) {
            const departure = adjustLegTime(arrival.origDepartureTime, arrival.origDelayMinutes) || arrival.origDepartureTime;
            const via = arrival.isDirect ? "direct" : `via ${arrival.connectionStation} (train ${arrival.termTrain})`;
            console.log(`#${arrival.origTrain} ${arrival.origLine}: departs ${departure}, ${via}`);
        }
    } catch (error: unknown) {
        console.error("Error fetching next-to-arrive:", describeError(error));
        process.exitCode = 1;
    }
}

checkNextToArrive().catch((error: unknown) => {
    console.error("Unexpected failure:", describeError(error));
    process.exitCode = 1;
});

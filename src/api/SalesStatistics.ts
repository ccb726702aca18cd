import { MOJANG_API, Transport } from "../transport/Transport";
import { SalesStatisticsSchema } from "../validation/responses";
import { Requests } from "./Requests";

export enum SaleMetric {
    MINECRAFT_ITEMS_SOLD = "item_sold_minecraft",
    MINECRAFT_PREPAID_CARDS_REDEEMED = "prepaid_card_redeemed_minecraft",
    COBALT_ITEMS_SOLD = "item_sold_cobalt",
    COBALT_PREPAID_CARDS_REDEEMED = "prepaid_card_redeemed_cobalt",
    SCROLLS_ITEMS_SOLD = "item_sold_scrolls",
    DUNGEONS_ITEMS_SOLD = "item_sold_dungeons"
}

export const SaleMetrics = {
    minecraft: [SaleMetric.MINECRAFT_ITEMS_SOLD, SaleMetric.MINECRAFT_PREPAID_CARDS_REDEEMED],
    cobalt: [SaleMetric.COBALT_ITEMS_SOLD, SaleMetric.COBALT_PREPAID_CARDS_REDEEMED],
    scrolls: [SaleMetric.SCROLLS_ITEMS_SOLD],
    dungeons: [SaleMetric.DUNGEONS_ITEMS_SOLD],
    all: Object.values(SaleMetric)
} as const;

export interface SalesStatisticsResponse {
    total: number;
    last24h: number;
    saleVelocityPerSeconds: number;
}

export class SalesStatistics {

    /**
     * Keys in declaration order, without duplicates.
     */
    static metricKeys(metrics: readonly SaleMetric[]): SaleMetric[] {
        return Object.values(SaleMetric).filter(metric => metrics.includes(metric));
    }

    /**
     * Combined sales of the given metrics.
     */
    static async fetch(transport: Transport, metrics: readonly SaleMetric[]): Promise<SalesStatisticsResponse> {
        const response = await Requests.send(transport, {
            service: MOJANG_API,
            method: "POST",
            url: "/orders/statistics",
            data: {
                metricKeys: SalesStatistics.metricKeys(metrics)
            }
        });
        if (!Requests.isOk(response.status)) {
            throw Requests.requestFailed(response, "Sales statistics fetch");
        }
        return Requests.parse(SalesStatisticsSchema, response, "sales statistics");
    }

}

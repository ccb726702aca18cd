import { SaleMetric, SaleMetrics, SalesStatistics } from "../../src/api/SalesStatistics";
import { StubTransport } from "../../src/test/StubTransport";
import { MOJANG_API } from "../../src/transport/Transport";
import { ApiErrorCode } from "../../src/ClientError";

const STATS = {
    total: 1200,
    last24h: 34,
    saleVelocityPerSeconds: 0.5
};

describe('sales statistics', () => {

    test('should order and dedupe metric keys', () => {
        expect(SalesStatistics.metricKeys([SaleMetric.DUNGEONS_ITEMS_SOLD, SaleMetric.MINECRAFT_ITEMS_SOLD, SaleMetric.DUNGEONS_ITEMS_SOLD]))
            .toEqual(["item_sold_minecraft", "item_sold_dungeons"]);
    });

    test('should list every metric', () => {
        expect(SalesStatistics.metricKeys(SaleMetrics.all)).toEqual([
            "item_sold_minecraft",
            "prepaid_card_redeemed_minecraft",
            "item_sold_cobalt",
            "prepaid_card_redeemed_cobalt",
            "item_sold_scrolls",
            "item_sold_dungeons"
        ]);
    });

    test('should post the metric keys', async () => {
        const transport = new StubTransport().on(MOJANG_API, "/orders/statistics", {status: 200, data: STATS});
        await expect(SalesStatistics.fetch(transport, SaleMetrics.minecraft)).resolves.toEqual(STATS);
        expect(transport.requests).toEqual([{
            service: MOJANG_API,
            method: "POST",
            url: "/orders/statistics",
            data: {
                metricKeys: ["item_sold_minecraft", "prepaid_card_redeemed_minecraft"]
            }
        }]);
    });

    test('should report a malformed response', async () => {
        const transport = new StubTransport().on(MOJANG_API, "/orders/statistics", {status: 200, data: {total: 1200}});
        await expect(SalesStatistics.fetch(transport, SaleMetrics.scrolls)).rejects.toMatchObject({code: ApiErrorCode.MALFORMED_RESPONSE});
    });

});

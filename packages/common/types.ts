import { z } from "zod";

export const MAX_HOLDINGS = 100;

// Empty or missing values are kept so the aggregator can skip them silently.
const SymbolInputSchema = z
    .string({ invalid_type_error: "Symbol must be a string" })
    .nullish()
    .transform((symbol) => symbol ?? "");

const SharesInputSchema = z
    .union([z.number(), z.string().trim(), z.null()], {
        invalid_type_error: "Shares must be a number",
    })
    .optional()
    .transform((shares) => (shares == null || shares === "" ? null : Number(shares)));

export const HoldingSchema = z.object({
    symbol: SymbolInputSchema,
    shares: SharesInputSchema,
});

export const HoldingsRequestSchema = z.object({
    holdings: z
        .array(HoldingSchema)
        .max(MAX_HOLDINGS, { message: `At most ${MAX_HOLDINGS} holdings per request` }),
});

/** Parallel arrays, as submitted by the manual-input form. */
export const ParallelListsRequestSchema = z.object({
    symbols: z
        .array(SymbolInputSchema)
        .max(MAX_HOLDINGS, { message: `At most ${MAX_HOLDINGS} symbols per request` }),
    shares: z
        .array(SharesInputSchema)
        .max(MAX_HOLDINGS, { message: `At most ${MAX_HOLDINGS} share counts per request` }),
});

export const PortfolioRequestSchema = z.union([
    HoldingsRequestSchema,
    ParallelListsRequestSchema,
]);

export type Holding = z.output<typeof HoldingSchema>;
export type PortfolioRequest = z.output<typeof PortfolioRequestSchema>;

export const DEBT_ENGINE = Symbol("DEBT_ENGINE");
export const ENGINE_SETTINGS = Symbol("ENGINE_SETTINGS");
export const ENGINE_COLLABORATORS = Symbol("ENGINE_COLLABORATORS");

/** Fractional digits of the development price feeds (USD pairs) */
export const FEED_DECIMALS = 8;

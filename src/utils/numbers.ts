export const CURRENCY_SYMBOL = "₹";

/**
 * Rounds half away from zero to the given number of decimals, using exponent
 * notation so values such as 1.005 round the way they read.
 */
export const roundTo = (value: number, digits: number): number => {
    if (!Number.isFinite(value)) return value;
    const sign = value < 0 ? -1 : 1;
    const magnitude = String(Math.abs(value));
    if (magnitude.includes("e")) {
        const factor = 10 ** digits;
        const rounded = Math.round(Math.abs(value) * factor);
        return rounded === 0 ? 0 : (sign * rounded) / factor;
    }
    const shifted = Math.round(Number(`${magnitude}e${digits}`));
    return shifted === 0 ? 0 : sign * Number(`${shifted}e-${digits}`);
};

export const formatPrice = (price: number): string => `${CURRENCY_SYMBOL}${price}`;

export const formatSignedPrice = (amount: number): string =>
    `${amount < 0 ? "-" : "+"}${CURRENCY_SYMBOL}${Math.abs(amount)}`;

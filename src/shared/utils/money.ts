// Absorbs binary noise in max / increment, e.g. 99.99 / 0.01
const STEP_EPSILON = 1e-9;

/**
 * Rounds an amount to the venue's currency increment without leaving [min, max].
 */
export function roundToIncrement(amount: number, increment: number, min: number, max: number): number {
    const steps = Math.round(amount / increment);
    let rounded = toPrecision(steps * increment, increment);

    if (rounded > max) {
        rounded = toPrecision(Math.floor(max / increment + STEP_EPSILON) * increment, increment);
    }
    if (rounded < min) {
        rounded = toPrecision(Math.ceil(min / increment - STEP_EPSILON) * increment, increment);
    }
    return rounded;
}

// 0.1 * 3 !== 0.3
function toPrecision(value: number, increment: number): number {
    const decimals = Math.max(0, -Math.floor(Math.log10(increment)));
    return Number(value.toFixed(decimals));
}

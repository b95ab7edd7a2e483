/**
 * Dimension Formatter
 *
 * Converts decimal feet (the model's internal length unit) into an
 * architectural dimension string rounded to the nearest half inch:
 * 65.7083 → 65'-8 1/2"
 */

export const ZERO_DIMENSION = `0'-0"`;

export interface FeetAndInches {
    feet: number;
    inches: number;
    halfInch: boolean;
}

/**
 * Split decimal feet into whole feet, whole inches and a half-inch flag.
 * Sub-inch remainder: [0, 0.25) drops, [0.25, 0.75) is a half, [0.75, 1) rounds the inch up.
 */
export function toFeetAndInches(decimalFeet: number): FeetAndInches {
    let feet = Math.floor(decimalFeet);
    const totalInches = (decimalFeet - feet) * 12;

    let inches = Math.floor(totalInches);
    const remainder = totalInches - inches;
    let halfInch = false;

    if (remainder >= 0.25 && remainder < 0.75) {
        halfInch = true;
    } else if (remainder >= 0.75) {
        inches++;
    }

    if (inches >= 12) {
        feet++;
        inches -= 12;
    }

    return { feet, inches, halfInch };
}

export function formatDimension(decimalFeet: number): string {
    const { feet, inches, halfInch } = toFeetAndInches(decimalFeet);
    return `${feet}'-${inches}${halfInch ? ' 1/2' : ''}"`;
}

/**
 * Render a double as shortest round-trip digits in fixed notation for decimal
 * exponents in [-4, 16) and scientific notation (`1.5e-05`, `1e+16`) otherwise.
 * Integral values get a trailing ".0".
 *
 * `Number.prototype.toString` gives the same digits but stays fixed from 1e-6 up to 1e21.
 */
export function formatDouble(value: number): string {
    if (Number.isNaN(value)) {
        return 'nan';
    }
    if (!Number.isFinite(value)) {
        return value > 0 ? 'inf' : '-inf';
    }

    const [mantissa, exponentText] = value.toExponential().split('e');
    const exponent = Number(exponentText);

    if (exponent < -4 || exponent >= 16) {
        const sign = exponent < 0 ? '-' : '+';
        return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
    }

    const fixed = String(value);
    return Number.isInteger(value) ? `${fixed}.0` : fixed;
}

/**
 * Derive the `token` query parameter the syndication endpoint expects for a post.
 * Obfuscation only: (id / 1e15) * pi, formatted, with every "0" and "." removed.
 */
export function deriveToken(postId: string): string {
    const value = (Number(postId) / 1e15) * Math.PI;
    return formatDouble(value).replace(/[0.]/g, '');
}

/** A point in normalized image coordinates (0..1, origin top-left). */
export interface Point {
    x: number;
    y: number;
}

/** A rectangle in normalized image coordinates. */
export interface Rect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export function clamp(value: number, min = 0, max = 1): number {
    if (Number.isNaN(value)) return min;
    return Math.max(min, Math.min(max, value));
}

export function distance(a: Point, b: Point): number {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return Math.sqrt(dx * dx + dy * dy);
}

export function rectCenter(rect: Rect): Point {
    return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export function rectArea(rect: Rect): number {
    return rect.width * rect.height;
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    let sum = 0;
    for (const v of values) sum += v;
    return sum / values.length;
}

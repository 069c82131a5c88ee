import { LogPosition } from '@/types/eventLog.types';

const parse = (position : LogPosition) : [number, number] => {
    const [ms, seq] = position.split('-');
    return [Number(ms) || 0, Number(seq) || 0];
}

/**
 * Orders two stream ids numerically, millisecond part first.
 */
export function comparePositions(a : LogPosition, b : LogPosition) : number {
    const [aMs, aSeq] = parse(a);
    const [bMs, bSeq] = parse(b);
    if (aMs !== bMs) return aMs < bMs ? -1 : 1;
    if (aSeq !== bSeq) return aSeq < bSeq ? -1 : 1;
    return 0;
}

/** The smallest id strictly greater than `position`. */
export function nextPosition(position : LogPosition) : LogPosition {
    const [ms, seq] = parse(position);
    return `${ms}-${seq + 1}`;
}

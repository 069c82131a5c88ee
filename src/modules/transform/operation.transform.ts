import { Operation } from '@/types/document.types';

/**
 * Shifts `incoming` so it still lands on the intended text after
 * `concurrent` has been applied. Only one prior operation is considered:
 * there is no version vector, so three or more concurrent edits can end up
 * different on different clients.
 */
export function transform(incoming : Operation, concurrent : Operation) : Operation {
    if (concurrent.kind === 'insert' && concurrent.position <= incoming.position) {
        return { ...incoming, position : incoming.position + concurrent.text.length };
    }
    if (concurrent.kind === 'delete' && concurrent.position < incoming.position) {
        const shift = Math.min(concurrent.text.length, incoming.position - concurrent.position);
        return { ...incoming, position : Math.max(0, incoming.position - shift) };
    }
    return incoming;
}

/**
 * Inserts splice `text` in at `position`; deletes remove `text.length`
 * characters from `position`. Both clamp to the content, so a delete past
 * the end truncates instead of failing.
 */
export function apply(content : string, op : Operation) : string {
    const start = Math.min(op.position, content.length);
    if (op.kind === 'insert') {
        return content.slice(0, start) + op.text + content.slice(start);
    }
    const end = Math.min(start + op.text.length, content.length);
    return content.slice(0, start) + content.slice(end);
}

/** The operation that undoes `op` when applied to `apply(content, op)`. */
export function invert(content : string, op : Operation) : Operation {
    const start = Math.min(op.position, content.length);
    if (op.kind === 'insert') {
        return { position : start, text : op.text, kind : 'delete' };
    }
    const end = Math.min(start + op.text.length, content.length);
    return { position : start, text : content.slice(start, end), kind : 'insert' };
}

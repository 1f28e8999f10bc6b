import type { Segment } from "../tracing/segment";

export interface ISegmentEmitter {
    /** Sends a closed segment tree to the collector. Never throws and never blocks on the network. */
    emit(segment: Segment): void;
}

import { generateEntityId } from "./traceHeader";

/** Upper bound, in UTF-8 bytes, of one serialized segment tree. */
export const MAX_SEGMENT_DOCUMENT_BYTES = 64 * 1024;

const ANNOTATION_KEY_PATTERN = /^[A-Za-z0-9_]+$/;
const DEFAULT_METADATA_NAMESPACE = "default";
const MAX_ID_ATTEMPTS = 8;

export type MetadataValue =
    | string
    | number
    | boolean
    | null
    | MetadataValue[]
    | { [key: string]: MetadataValue };

export type AnnotationValue = string | number | boolean;

/** Seconds since the epoch, with sub-second precision. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export class MetadataSizeError extends Error {
    constructor(
        readonly key: string,
        readonly size: number,
        readonly limit: number = MAX_SEGMENT_DOCUMENT_BYTES,
    ) {
        super(`Attaching "${key}" would grow the segment document to ${size} bytes (limit ${limit})`);
        this.name = "MetadataSizeError";
    }
}

export class MetadataSerializationError extends Error {
    constructor(readonly key: string, options?: { cause?: unknown }) {
        super(`Value for "${key}" cannot be serialized`, options);
        this.name = "MetadataSerializationError";
    }
}

export class EntityClosedError extends Error {
    constructor(readonly entityName: string) {
        super(`Trace entity "${entityName}" is already closed`);
        this.name = "EntityClosedError";
    }
}

export class InvalidAnnotationError extends Error {
    constructor(readonly key: string) {
        super(`Annotation key "${key}" must match ${ANNOTATION_KEY_PATTERN.source}`);
        this.name = "InvalidAnnotationError";
    }
}

export type AttachOutcome =
    | { kind: "added" }
    | {
        kind: "rejected";
        error: MetadataSizeError | MetadataSerializationError | EntityClosedError | InvalidAnnotationError;
    };

export interface ExceptionRecord {
    id: string;
    message: string;
    type: string;
    remote?: boolean;
}

export interface HttpRequestInfo {
    method?: string;
    url?: string;
    user_agent?: string;
    client_ip?: string;
    x_forwarded_for?: boolean;
    traced?: boolean;
}

export interface HttpResponseInfo {
    status?: number;
    content_length?: number;
}

export interface AwsCallInfo {
    operation?: string;
    region?: string;
    table_name?: string;
    request_id?: string;
    retries?: number;
}

/** Wire representation of a segment or subsegment. */
export interface EntityDocument {
    name: string;
    id: string;
    start_time: number;
    end_time?: number;
    in_progress?: true;
    type?: "subsegment";
    trace_id?: string;
    parent_id?: string;
    namespace?: string;
    origin?: string;
    service?: { version: string };
    http?: { request?: HttpRequestInfo; response?: HttpResponseInfo };
    aws?: AwsCallInfo;
    error?: true;
    throttle?: true;
    fault?: true;
    cause?: { exceptions: ExceptionRecord[] };
    annotations?: Record<string, AnnotationValue>;
    metadata?: Record<string, Record<string, MetadataValue>>;
    subsegments?: EntityDocument[];
}

export interface CloseOptions {
    /** Failure of the traced work; recorded as an exception before closing. */
    error?: unknown;
    /** Marks the entity as closed before its work finished. */
    incomplete?: boolean;
}

export interface ErrorOptions {
    remote?: boolean;
    /** HTTP status tied to the failure; selects error/throttle/fault. */
    status?: number;
}

/**
 * Shared behaviour of segments and subsegments.
 * An entity is append-only until closed, and closed at most once.
 */
export abstract class TraceEntity {
    abstract readonly segment: Segment;

    private endTime: number | undefined;
    private readonly children: Subsegment[] = [];
    private readonly metadata = new Map<string, Map<string, MetadataValue>>();
    private readonly annotations = new Map<string, AnnotationValue>();
    private readonly exceptions: ExceptionRecord[] = [];
    private readonly recordedErrors = new Set<unknown>();
    private httpRequest: HttpRequestInfo | undefined;
    private httpResponse: HttpResponseInfo | undefined;
    private errorFlag = false;
    private throttleFlag = false;
    private faultFlag = false;

    protected constructor(
        readonly name: string,
        readonly id: string,
        readonly startTime: number,
        readonly sequence: number,
    ) {}

    get isClosed(): boolean {
        return this.endTime !== undefined;
    }

    get closedAt(): number | undefined {
        return this.endTime;
    }

    get error(): boolean {
        return this.errorFlag;
    }

    get throttle(): boolean {
        return this.throttleFlag;
    }

    get fault(): boolean {
        return this.faultFlag;
    }

    /** True when any of error, throttle or fault is set. */
    get hasError(): boolean {
        return this.errorFlag || this.throttleFlag || this.faultFlag;
    }

    get exceptionRecords(): readonly ExceptionRecord[] {
        return [...this.exceptions];
    }

    /** Children ordered by start time, ties broken by creation order. */
    get subsegments(): readonly Subsegment[] {
        return [...this.children].sort((a, b) => a.startTime - b.startTime || a.sequence - b.sequence);
    }

    getMetadata(key: string, namespace: string = DEFAULT_METADATA_NAMESPACE): MetadataValue | undefined {
        return this.metadata.get(namespace)?.get(key);
    }

    getAnnotation(key: string): AnnotationValue | undefined {
        return this.annotations.get(key);
    }

    addNewSubsegment(name: string, namespace?: string): Subsegment {
        if (this.isClosed) {
            throw new EntityClosedError(this.name);
        }
        const subsegment = new Subsegment(name, this, namespace);
        this.children.push(subsegment);
        return subsegment;
    }

    /** Stores a detached copy of `value`; later changes to the caller's object are not seen. */
    addMetadata(key: string, value: MetadataValue, namespace: string = DEFAULT_METADATA_NAMESPACE): AttachOutcome {
        if (this.isClosed) {
            return { kind: "rejected", error: new EntityClosedError(this.name) };
        }
        let detached: MetadataValue;
        try {
            detached = JSON.parse(JSON.stringify(value));
        } catch (error) {
            return { kind: "rejected", error: new MetadataSerializationError(key, { cause: error }) };
        }

        let entries = this.metadata.get(namespace);
        const createdNamespace = !entries;
        if (!entries) {
            entries = new Map();
        }
        const previous = entries.get(key);
        const target = entries;

        return this.attach(key, () => {
            target.set(key, detached);
            if (createdNamespace) this.metadata.set(namespace, target);
        }, () => {
            if (previous !== undefined) {
                target.set(key, previous);
            } else {
                target.delete(key);
            }
            if (createdNamespace) this.metadata.delete(namespace);
        });
    }

    addAnnotation(key: string, value: AnnotationValue): AttachOutcome {
        if (!ANNOTATION_KEY_PATTERN.test(key)) {
            return { kind: "rejected", error: new InvalidAnnotationError(key) };
        }
        const previous = this.annotations.get(key);
        return this.attach(key, () => {
            this.annotations.set(key, value);
        }, () => {
            if (previous !== undefined) {
                this.annotations.set(key, previous);
            } else {
                this.annotations.delete(key);
            }
        });
    }

    setHttpRequest(info: HttpRequestInfo): void {
        if (this.isClosed) return;
        this.httpRequest = { ...this.httpRequest, ...info };
    }

    setHttpResponse(info: HttpResponseInfo): void {
        if (this.isClosed) return;
        this.httpResponse = { ...this.httpResponse, ...info };
        if (info.status !== undefined) {
            this.flagStatus(info.status);
        }
    }

    /**
     * Records a failure in the entity's cause and raises the matching flag.
     * A value already recorded on this entity, or any error after close, is ignored.
     */
    addError(error: unknown, options: ErrorOptions = {}): void {
        if (this.isClosed || this.recordedErrors.has(error)) return;
        this.recordedErrors.add(error);
        this.exceptions.push({
            id: generateEntityId(),
            message: error instanceof Error ? error.message : String(error),
            type: error instanceof Error ? error.name : typeof error,
            ...(options.remote ? { remote: true } : {}),
        });
        if (options.status !== undefined) {
            this.flagStatus(options.status);
        } else {
            this.faultFlag = true;
        }
    }

    /**
     * Closes the entity and any still-open descendants.
     * Returns false when the entity was already closed.
     */
    close(options: CloseOptions = {}): boolean {
        if (this.isClosed) return false;

        if (options.error !== undefined) {
            this.addError(options.error);
        }
        if (options.incomplete) {
            this.exceptions.push({
                id: generateEntityId(),
                message: "Closed before the traced work completed",
                type: "Incomplete",
            });
            this.faultFlag = true;
        }
        for (const child of this.children) {
            if (!child.isClosed) child.close({ incomplete: true });
        }
        this.endTime = Math.max(this.segment.now(), this.startTime);
        return true;
    }

    toDocument(): EntityDocument {
        const doc: EntityDocument = {
            name: this.name,
            id: this.id,
            start_time: this.startTime,
        };
        if (this.endTime !== undefined) {
            doc.end_time = this.endTime;
        } else {
            doc.in_progress = true;
        }
        if (this.httpRequest || this.httpResponse) {
            doc.http = {
                ...(this.httpRequest ? { request: { ...this.httpRequest } } : {}),
                ...(this.httpResponse ? { response: { ...this.httpResponse } } : {}),
            };
        }
        if (this.errorFlag) doc.error = true;
        if (this.throttleFlag) doc.throttle = true;
        if (this.faultFlag) doc.fault = true;
        if (this.exceptions.length > 0) {
            doc.cause = { exceptions: this.exceptions.map((e) => ({ ...e })) };
        }
        if (this.annotations.size > 0) {
            doc.annotations = Object.fromEntries(this.annotations);
        }
        if (this.metadata.size > 0) {
            doc.metadata = Object.fromEntries(
                [...this.metadata].map(([ns, entries]) => [ns, Object.fromEntries(entries)]),
            );
        }
        const children = this.subsegments;
        if (children.length > 0) {
            doc.subsegments = children.map((child) => child.toDocument());
        }
        return doc;
    }

    private attach(key: string, apply: () => void, revert: () => void): AttachOutcome {
        if (this.isClosed) {
            return { kind: "rejected", error: new EntityClosedError(this.name) };
        }
        apply();
        let size: number;
        try {
            size = this.segment.serializedSize();
        } catch (error) {
            revert();
            return { kind: "rejected", error: new MetadataSerializationError(key, { cause: error }) };
        }
        if (size > MAX_SEGMENT_DOCUMENT_BYTES) {
            revert();
            return { kind: "rejected", error: new MetadataSizeError(key, size) };
        }
        return { kind: "added" };
    }

    private flagStatus(status: number): void {
        if (status === 429) {
            this.errorFlag = true;
            this.throttleFlag = true;
        } else if (status >= 400 && status < 500) {
            this.errorFlag = true;
        } else if (status >= 500) {
            this.faultFlag = true;
        }
    }
}

export interface SegmentOptions {
    traceId: string;
    /** Id of the upstream entity, taken from the incoming trace header. */
    parentId?: string;
    sampled?: boolean;
    origin?: string;
    serviceVersion?: string;
    clock?: Clock;
    idGenerator?: () => string;
}

/** Top-level unit of work for one service handling one request. */
export class Segment extends TraceEntity {
    readonly segment: Segment = this;
    readonly traceId: string;
    readonly parentId: string | undefined;
    readonly sampled: boolean;
    readonly origin: string | undefined;
    readonly serviceVersion: string | undefined;

    private readonly clock: Clock;
    private readonly idGenerator: () => string;
    private readonly usedIds = new Set<string>();
    private sequenceCounter = 0;

    constructor(name: string, options: SegmentOptions) {
        super(name, (options.idGenerator ?? generateEntityId)(), (options.clock ?? systemClock)(), 0);
        this.traceId = options.traceId;
        this.parentId = options.parentId;
        this.sampled = options.sampled ?? true;
        this.origin = options.origin;
        this.serviceVersion = options.serviceVersion;
        this.clock = options.clock ?? systemClock;
        this.idGenerator = options.idGenerator ?? generateEntityId;
        this.usedIds.add(this.id);
    }

    now(): number {
        return this.clock();
    }

    /** Issues an entity id not yet used anywhere in this segment tree. */
    allocateId(): string {
        for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
            const id = this.idGenerator();
            if (!this.usedIds.has(id)) {
                this.usedIds.add(id);
                return id;
            }
        }
        throw new Error(`Unable to allocate a unique entity id after ${MAX_ID_ATTEMPTS} attempts`);
    }

    nextSequence(): number {
        this.sequenceCounter += 1;
        return this.sequenceCounter;
    }

    override toDocument(): EntityDocument {
        const doc = super.toDocument();
        return {
            ...doc,
            trace_id: this.traceId,
            ...(this.parentId ? { parent_id: this.parentId } : {}),
            ...(this.origin ? { origin: this.origin } : {}),
            ...(this.serviceVersion ? { service: { version: this.serviceVersion } } : {}),
        };
    }

    serialize(): string {
        return JSON.stringify(this.toDocument());
    }

    serializedSize(): number {
        return Buffer.byteLength(this.serialize(), "utf8");
    }
}

/** Nested unit of work, exclusively owned by its parent. */
export class Subsegment extends TraceEntity {
    readonly segment: Segment;
    private awsInfo: AwsCallInfo | undefined;

    constructor(name: string, readonly parent: TraceEntity, readonly namespace?: string) {
        super(name, parent.segment.allocateId(), parent.segment.now(), parent.segment.nextSequence());
        this.segment = parent.segment;
    }

    get aws(): AwsCallInfo | undefined {
        return this.awsInfo ? { ...this.awsInfo } : undefined;
    }

    setAws(info: AwsCallInfo): void {
        if (this.isClosed) return;
        this.awsInfo = { ...this.awsInfo, ...info };
    }

    override toDocument(): EntityDocument {
        const doc = super.toDocument();
        return {
            ...doc,
            ...(this.namespace ? { namespace: this.namespace } : {}),
            ...(this.awsInfo ? { aws: { ...this.awsInfo } } : {}),
        };
    }

    /** Document for sending this subsegment separately from its segment. */
    toStreamDocument(): EntityDocument {
        return {
            ...this.toDocument(),
            type: "subsegment",
            parent_id: this.parent.id,
            trace_id: this.segment.traceId,
        };
    }
}

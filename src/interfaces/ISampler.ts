export interface SamplingRequest {
    serviceName: string;
    host?: string;
    method?: string;
    path?: string;
}

export interface ISampler {
    shouldSample(request: SamplingRequest): boolean;
}

import tracer from "./tracer";

const PREFIX = "transitbundle.";

export type MetricTags = Record<string, string>;

export type MetricsSink = {
    increment(name: string, tags?: MetricTags): void;
    gauge(name: string, value: number, tags?: MetricTags): void;
    histogram(name: string, value: number, tags?: MetricTags): void;
};

export const metrics: MetricsSink = {
    increment(name, tags) {
        tracer.dogstatsd.increment(`${PREFIX}${name}`, 1, tags);
    },
    gauge(name, value, tags) {
        tracer.dogstatsd.gauge(`${PREFIX}${name}`, value, tags);
    },
    histogram(name, value, tags) {
        tracer.dogstatsd.histogram(`${PREFIX}${name}`, value, tags);
    },
};

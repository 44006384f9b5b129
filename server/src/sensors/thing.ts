import type { PropertyMetadata, SensorSpec, SensorValue, ValueSink } from "./types";

export type PropertyListener = (property: string, value: SensorValue) => void;

export type ThingDescription = {
    id: string;
    title: string;
    "@context": "https://webthings.io/schemas";
    "@type": string[];
    description: string;
    href: string;
    properties: Record<string, PropertyMetadata & { links: { rel: "property"; href: string }[] }>;
};

/**
 * Published state of one sensor. Its updater writes through publish(); the
 * Thing server reads values and subscribes to changes.
 */
export class SensorThing implements ValueSink {
    private readonly values = new Map<string, SensorValue>();
    private readonly listeners = new Set<PropertyListener>();

    constructor(readonly spec: SensorSpec) {
        for (const field of spec.fields) this.values.set(field.property, null);
    }

    get id() {
        return this.spec.id;
    }

    hasProperty(property: string) {
        return this.values.has(property);
    }

    getValue(property: string): SensorValue | undefined {
        return this.values.get(property);
    }

    getValues(): Record<string, SensorValue> {
        return Object.fromEntries(this.values);
    }

    publish(property: string, value: SensorValue) {
        if (!this.values.has(property)) {
            throw new Error(`Unknown property "${property}" on ${this.spec.id}`);
        }
        if (this.values.get(property) === value) return;

        this.values.set(property, value);
        for (const listener of [...this.listeners]) {
            listener(property, value);
        }
    }

    subscribe(listener: PropertyListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    describe(): ThingDescription {
        const href = `/things/${this.spec.id}`;
        const properties: ThingDescription["properties"] = {};
        for (const field of this.spec.fields) {
            properties[field.property] = {
                ...field.metadata,
                links: [{ rel: "property", href: `${href}/properties/${field.property}` }],
            };
        }

        return {
            id: this.spec.id,
            title: this.spec.title,
            "@context": "https://webthings.io/schemas",
            "@type": [...this.spec.types],
            description: this.spec.description,
            href,
            properties,
        };
    }
}

// Presentation-only property metadata; the core never enforces it.
export type PropertyMetadata = {
    "@type": "LevelProperty" | "TemperatureProperty";
    title: string;
    type: "number";
    description: string;
    unit: string;
    minimum?: number;
    maximum?: number;
    readOnly: true;
};

export type SensorField = {
    /** Property name the value is published under */
    property: string;
    /** Observation field the value is read from */
    source: string;
    metadata: PropertyMetadata;
};

export type SensorType = "MultiLevelSensor" | "TemperatureSensor";

export type SensorSpec = {
    readonly id: string;
    readonly title: string;
    readonly description: string;
    readonly location: string;
    readonly types: readonly SensorType[];
    readonly fields: readonly SensorField[];
};

/** null publishes "value unknown" */
export type SensorValue = number | null;

export interface ValueSink {
    publish(property: string, value: SensorValue): void;
}

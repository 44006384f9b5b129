import { z } from "zod";
import type { PropertyMetadata, SensorField, SensorSpec } from "./types";

const Location = z.string().trim().min(1);
const Prefix = z.string().regex(/^[A-Za-z0-9_]+$/, "must be a bare field prefix");

export const SensorLayoutEntry = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("humidity"), location: Location, prefix: Prefix }),
    z.object({
        kind: z.literal("temperature"),
        location: Location,
        prefix: Prefix,
        withHumidity: z.boolean().default(false),
    }),
    z.object({ kind: z.literal("pressure"), location: Location, field: Prefix }),
]);
export type SensorLayoutEntry = z.infer<typeof SensorLayoutEntry>;

export const SensorLayout = z.array(SensorLayoutEntry).min(1);

export function titleCase(s: string) {
    return s.replace(/\b\w/g, (c) => c.toUpperCase());
}

export function slugify(s: string) {
    return s
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, "-")
        .replace(/^-+|-+$/g, "");
}

function humidityMetadata(location: string): PropertyMetadata {
    return {
        "@type": "LevelProperty",
        title: `${titleCase(location)} Humidity`,
        type: "number",
        description: `The current ${location} humidity in %`,
        minimum: 0,
        maximum: 100,
        unit: "percent",
        readOnly: true,
    };
}

export function humiditySensor(location: string, prefix: string): SensorSpec {
    const title = `${titleCase(location)} Humidity Sensor`;
    return {
        id: slugify(title),
        title,
        description: `The humidity sensor in ${location}`,
        location,
        types: ["MultiLevelSensor"],
        fields: [{ property: "level", source: `${prefix}_hygro`, metadata: humidityMetadata(location) }],
    };
}

export function temperatureSensor(location: string, prefix: string, withHumidity = false): SensorSpec {
    const title = `${titleCase(location)} Temperature Sensor`;
    const fields: SensorField[] = [
        {
            property: "temperature",
            source: `${prefix}_temp`,
            metadata: {
                "@type": "TemperatureProperty",
                title: `${titleCase(location)} Temperature`,
                type: "number",
                description: `The current ${location} temperature in °C`,
                unit: "degree celsius",
                readOnly: true,
            },
        },
    ];
    if (withHumidity) {
        fields.push({ property: "humidity", source: `${prefix}_hygro`, metadata: humidityMetadata(location) });
    }

    return {
        id: slugify(title),
        title,
        description: `The temperature sensor in ${location}`,
        location,
        types: ["TemperatureSensor"],
        fields,
    };
}

export function pressureSensor(location: string, field: string): SensorSpec {
    const title = `${titleCase(location)} Barometer`;
    return {
        id: slugify(title),
        title,
        description: `The barometer (air pressure sensor) in ${location}`,
        location,
        types: ["MultiLevelSensor"],
        fields: [
            {
                property: "level",
                source: field,
                metadata: {
                    "@type": "LevelProperty",
                    title: `${titleCase(location)} Air Pressure`,
                    type: "number",
                    description: `The current ${location} air pressure in hPa/mbar`,
                    minimum: 0,
                    maximum: 10000,
                    unit: "hPa",
                    readOnly: true,
                },
            },
        ],
    };
}

export function buildSensorSpecs(layout: SensorLayoutEntry[]): SensorSpec[] {
    const specs = layout.map((entry) => {
        switch (entry.kind) {
            case "humidity":
                return humiditySensor(entry.location, entry.prefix);
            case "temperature":
                return temperatureSensor(entry.location, entry.prefix, entry.withHumidity);
            case "pressure":
                return pressureSensor(entry.location, entry.field);
        }
    });

    const seen = new Set<string>();
    for (const spec of specs) {
        if (seen.has(spec.id)) throw new Error(`Duplicate sensor "${spec.id}" in layout`);
        seen.add(spec.id);
    }
    return specs;
}

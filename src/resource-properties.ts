import { ObjectOrFacadeS, SchemaDefinition, SchemaTarget } from "typizator";
import { DecodeError, reasonOf } from "./errors";

/**
 * Every CloudFormation resource needs a unique physical resource ID. The ID derived for a custom resource
 * has the form `arn:custom:cfn-resource-provider:::{stack GUID}-{logical resource ID}/{suffix}`, the suffix
 * coming from the provider of the resource properties type.
 *
 * The suffix must change whenever the provisioning logic has to create a new underlying resource,
 * and stay the same for updates that only touch unrelated properties. Including the resource kind
 * and a version is a good idea, for example `bucket@1/${properties.BucketName}`.
 */
export interface PhysicalResourceIdSuffixProvider<P> {
    /**
     * Creates the suffix identifying the physical resource described by the given properties
     * @param properties Decoded resource properties
     * @returns Suffix to append to the physical ID, empty string for no suffix
     */
    physicalResourceIdSuffix: (properties: P) => string
}

/**
 * Describes how the `ResourceProperties` (and `OldResourceProperties`) of a request are decoded
 * and how they contribute to the physical resource ID
 */
export interface ResourcePropertiesType<P> extends PhysicalResourceIdSuffixProvider<P> {
    /**
     * Decodes the raw JSON payload, `undefined` if the payload is absent
     * @throws DecodeError if the payload doesn't fit the type
     */
    decode: (raw: unknown) => P
}

/**
 * Default suffix provider: no suffix at all
 */
export const noSuffix = (): string => ""

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value)

const describeValue = (value: unknown) =>
    value === undefined ? "nothing" :
        value === null ? "null" :
            Array.isArray(value) ? "an array" :
                typeof value

/**
 * Unboxes a JSON object into the target of a typizator object schema.
 * Keys not declared in the schema are rejected.
 */
export const unboxProperties = <T extends SchemaDefinition>(schema: ObjectOrFacadeS<T>, raw: unknown): SchemaTarget<T> => {
    if (!isRecord(raw))
        throw new DecodeError(`Resource properties must be an object, got ${describeValue(raw)}`)
    const declared = new Set<string>()
    schema.metadata.fields.forEach(key => declared.add(String(key)))
    Object.keys(raw).forEach(key => {
        if (!declared.has(key))
            throw new DecodeError(`Unknown resource property ${key}`)
    })
    schema.metadata.fields.forEach((key, value) => {
        const received = raw[String(key)]
        if (received === undefined && !value.metadata.optional)
            throw new DecodeError(`Mandatory ${String(key)} property missing from the resource properties`)
        if (received === null && value.metadata.notNull)
            throw new DecodeError(`Property ${String(key)} is null and it shouldn't be`)
    })
    const retval = {} as SchemaTarget<T>
    Object.entries(raw).forEach(([key, value]) => {
        try {
            Object.assign(retval, { [key]: schema.metadata.fields.get(key)?.unbox(value) })
        } catch (e) {
            throw new DecodeError(`Unboxing ${key}: ${reasonOf(e)}`)
        }
    })
    return retval
}

/**
 * Required resource properties described by a typizator object schema.
 * Decoding fails if the properties are absent, malformed or carry undeclared keys.
 * @param schema Object schema of the properties
 * @param suffix Suffix provider for the physical resource ID, no suffix by default
 */
export const schemaProperties = <T extends SchemaDefinition>(
    schema: ObjectOrFacadeS<T>,
    suffix: (properties: SchemaTarget<T>) => string = noSuffix
): ResourcePropertiesType<SchemaTarget<T>> => ({
    decode: (raw: unknown) => unboxProperties(schema, raw),
    physicalResourceIdSuffix: suffix
})

/**
 * Required resource properties decoded by the caller's own function.
 * The decoder is expected to throw on absent or malformed input, its errors are reported as `DecodeError`.
 */
export const customProperties = <P>(
    decode: (raw: unknown) => P,
    suffix: (properties: P) => string = noSuffix
): ResourcePropertiesType<P> => ({
    decode: (raw: unknown) => {
        try {
            return decode(raw)
        } catch (e) {
            if (e instanceof DecodeError) throw e
            throw new DecodeError(`Invalid resource properties: ${reasonOf(e)}`)
        }
    },
    physicalResourceIdSuffix: suffix
})

/**
 * Makes the properties optional: an absent or `null` payload decodes to `undefined`,
 * a present one must still satisfy the wrapped type
 */
export const optionalProperties = <P>(type: ResourcePropertiesType<P>): ResourcePropertiesType<P | undefined> => ({
    decode: (raw: unknown) => raw === undefined || raw === null ? undefined : type.decode(raw),
    physicalResourceIdSuffix: (properties: P | undefined) =>
        properties === undefined ? "" : type.physicalResourceIdSuffix(properties)
})

/**
 * For resources that take no properties and must fail if any are given.
 * Absent, `null` and `{}` payloads decode to `undefined`.
 */
export const noProperties: ResourcePropertiesType<undefined> = {
    decode: (raw: unknown) => {
        if (raw === undefined || raw === null || (isRecord(raw) && Object.keys(raw).length === 0))
            return undefined
        throw new DecodeError(`No resource properties expected, got ${isRecord(raw) ? Object.keys(raw).join(",") : describeValue(raw)}`)
    },
    physicalResourceIdSuffix: noSuffix
}

/**
 * Value of discarded resource properties
 */
export type Ignored = Record<string, never>

/**
 * For resources that take no properties and don't care if some are given: any payload, including none, is discarded
 */
export const ignoredProperties: ResourcePropertiesType<Ignored> = {
    decode: () => ({}),
    physicalResourceIdSuffix: noSuffix
}

import { boolS, objectS, stringS } from "typizator";
import {
    DecodeError,
    customProperties,
    ignoredProperties,
    noProperties,
    noSuffix,
    optionalProperties,
    schemaProperties
} from "../src";

describe("Testing the resource properties types", () => {
    const examplePropertiesS = objectS({
        ExampleProperty1: stringS.notNull,
        ExampleProperty2: boolS.optional
    })
    const required = schemaProperties(examplePropertiesS, properties => `${properties.ExampleProperty1}`)
    const optional = optionalProperties(required)

    test("Should decode required properties matching the schema", () => {
        expect(required.decode({ ExampleProperty1: "example property 1" }))
            .toEqual({ ExampleProperty1: "example property 1" })
        expect(required.decode({ ExampleProperty1: "example property 1", ExampleProperty2: true }))
            .toEqual({ ExampleProperty1: "example property 1", ExampleProperty2: true })
    })

    test("Should reject absent required properties", () => {
        expect(() => required.decode(undefined)).toThrow(DecodeError)
        expect(() => required.decode(undefined)).toThrow("Resource properties must be an object, got nothing")
        expect(() => required.decode(["list"])).toThrow("Resource properties must be an object, got an array")
    })

    test("Should reject malformed required properties", () => {
        // GIVEN a payload with a key the schema doesn't declare
        const payload = { UnknownProperty: null }

        // WHEN decoding it
        // THEN the unknown key is reported
        expect(() => required.decode(payload)).toThrow("Unknown resource property UnknownProperty")

        // AND keys named like object members are unknown too
        expect(() => required.decode({ ExampleProperty1: "example property 1", toString: "value" }))
            .toThrow("Unknown resource property toString")
        expect(() => required.decode({ ExampleProperty1: "example property 1", constructor: "value" }))
            .toThrow("Unknown resource property constructor")

        // AND a missing mandatory key is reported as well
        expect(() => required.decode({})).toThrow("Mandatory ExampleProperty1 property missing from the resource properties")

        // AND a null value on a not null key too
        expect(() => required.decode({ ExampleProperty1: null })).toThrow("Property ExampleProperty1 is null and it shouldn't be")
    })

    test("Should accept absent optional properties", () => {
        expect(optional.decode(undefined)).toBeUndefined()
        expect(optional.decode(null)).toBeUndefined()
        expect(optional.decode({ ExampleProperty1: "present" })).toEqual({ ExampleProperty1: "present" })
    })

    test("Should still reject malformed optional properties", () => {
        expect(() => optional.decode({ UnknownProperty: null })).toThrow(DecodeError)
    })

    test("Should only accept empty payloads when no properties are expected", () => {
        expect(noProperties.decode(undefined)).toBeUndefined()
        expect(noProperties.decode(null)).toBeUndefined()
        expect(noProperties.decode({})).toBeUndefined()
        expect(() => noProperties.decode({
            key1: "string",
            key2: ["list"],
            key3: { key4: "map" }
        })).toThrow("No resource properties expected, got key1,key2,key3")
        expect(() => noProperties.decode("string")).toThrow("No resource properties expected, got string")
    })

    test("Should discard any payload of ignored properties", () => {
        expect(ignoredProperties.decode(undefined)).toEqual({})
        expect(ignoredProperties.decode({
            key1: "string",
            key2: ["list"],
            key3: { key4: "map" }
        })).toEqual({})
        expect(ignoredProperties.decode(42)).toEqual({})
    })

    test("Should provide the suffixes of every properties type", () => {
        const properties = required.decode({ ExampleProperty1: "unique" })
        expect(required.physicalResourceIdSuffix(properties)).toEqual("unique")
        expect(optional.physicalResourceIdSuffix(properties)).toEqual("unique")
        expect(optional.physicalResourceIdSuffix(undefined)).toEqual("")
        expect(noProperties.physicalResourceIdSuffix(undefined)).toEqual("")
        expect(ignoredProperties.physicalResourceIdSuffix({})).toEqual("")
        expect(schemaProperties(examplePropertiesS).physicalResourceIdSuffix(properties)).toEqual("")
        expect(noSuffix()).toEqual("")
    })

    test("Should wrap the errors of custom decoders", () => {
        // GIVEN a caller-written decoder
        const bucketProperties = customProperties(
            (raw: unknown) => {
                if (typeof raw !== "string") throw new Error("Bucket name expected")
                return { bucketName: raw }
            },
            properties => `bucket@1/${properties.bucketName}`
        )

        // WHEN decoding a valid payload
        // THEN the decoder's value is returned
        expect(bucketProperties.decode("my-bucket")).toEqual({ bucketName: "my-bucket" })
        expect(bucketProperties.physicalResourceIdSuffix({ bucketName: "my-bucket" })).toEqual("bucket@1/my-bucket")

        // AND a decoder failure becomes a decode error
        expect(() => bucketProperties.decode(12)).toThrow(DecodeError)
        expect(() => bucketProperties.decode(12)).toThrow("Invalid resource properties: Bucket name expected")
    })
})

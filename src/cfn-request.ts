import { CfnRequest, CfnRequestType, REQUEST_TYPES } from "./lib/cloud-formation-types";
import { DecodeError } from "./errors";
import { PhysicalResourceIdSuffixProvider, ResourcePropertiesType, isRecord } from "./resource-properties";

/**
 * Prefix of every physical resource ID derived for Create and Update requests
 */
export const PHYSICAL_RESOURCE_ID_PREFIX = "arn:custom:cfn-resource-provider:::"

/**
 * Key CloudFormation adds to the resource properties of every request
 */
export const SERVICE_TOKEN_KEY = "ServiceToken"

const isRequestType = (value: unknown): value is CfnRequestType =>
    REQUEST_TYPES.some(requestType => requestType === value)

const requiredString = (event: Record<string, unknown>, key: string): string => {
    const value = event[key]
    if (typeof value !== "string")
        throw new DecodeError(`${key} must be a string, got ${value === undefined ? "nothing" : JSON.stringify(value)}`)
    return value
}

const withoutServiceToken = (raw: unknown): unknown => {
    if (!isRecord(raw) || !(SERVICE_TOKEN_KEY in raw)) return raw
    const { [SERVICE_TOKEN_KEY]: _serviceToken, ...properties } = raw
    return Object.keys(properties).length > 0 ? properties : undefined
}

const decodeProperties = <P>(event: Record<string, unknown>, key: string, propertiesType: ResourcePropertiesType<P>): P => {
    try {
        return propertiesType.decode(withoutServiceToken(event[key]))
    } catch (e) {
        if (e instanceof DecodeError) throw new DecodeError(`${key}: ${e.message}`)
        throw e
    }
}

/**
 * Decodes a raw CloudFormation custom resource event
 * @param raw Event as received by the lambda
 * @param propertiesType Describes how to decode `ResourceProperties` and `OldResourceProperties`
 * @returns Request variant selected by `RequestType`
 * @throws DecodeError if the discriminant is missing or unknown, or any field doesn't fit
 */
export const decodeRequest = <P>(raw: unknown, propertiesType: ResourcePropertiesType<P>): CfnRequest<P> => {
    if (!isRecord(raw))
        throw new DecodeError("CloudFormation event must be an object")
    const requestType = raw.RequestType
    if (requestType === undefined)
        throw new DecodeError("RequestType missing from the CloudFormation event")
    if (!isRequestType(requestType))
        throw new DecodeError(`Unknown RequestType ${JSON.stringify(requestType)}`)

    const common = {
        RequestId: requiredString(raw, "RequestId"),
        ResponseURL: requiredString(raw, "ResponseURL"),
        ResourceType: requiredString(raw, "ResourceType"),
        LogicalResourceId: requiredString(raw, "LogicalResourceId"),
        StackId: requiredString(raw, "StackId")
    }
    switch (requestType) {
        case "Create":
            return {
                RequestType: requestType,
                ...common,
                ResourceProperties: decodeProperties(raw, "ResourceProperties", propertiesType)
            }
        case "Update":
            return {
                RequestType: requestType,
                ...common,
                PhysicalResourceId: requiredString(raw, "PhysicalResourceId"),
                ResourceProperties: decodeProperties(raw, "ResourceProperties", propertiesType),
                OldResourceProperties: decodeProperties(raw, "OldResourceProperties", propertiesType)
            }
        case "Delete":
            return {
                RequestType: requestType,
                ...common,
                PhysicalResourceId: requiredString(raw, "PhysicalResourceId"),
                ResourceProperties: decodeProperties(raw, "ResourceProperties", propertiesType)
            }
    }
}

/**
 * Last segment of a stack ARN, the stack GUID. The whole string is used if it contains no `/`
 */
export const stackGuid = (stackId: string): string => stackId.split("/").pop() ?? stackId

/**
 * Physical resource ID to report for the request.
 * Delete requests keep the ID CloudFormation sent, Create and Update requests derive it from
 * the stack, the logical resource ID and the suffix of the resource properties.
 */
export const physicalResourceId = <P>(request: CfnRequest<P>, suffixProvider: PhysicalResourceIdSuffixProvider<P>): string => {
    if (request.RequestType === "Delete") return request.PhysicalResourceId
    const suffix = suffixProvider.physicalResourceIdSuffix(request.ResourceProperties)
    return `${PHYSICAL_RESOURCE_ID_PREFIX}${stackGuid(request.StackId)}-${request.LogicalResourceId}${suffix ? `/${suffix}` : ""}`
}

export const resourceProperties = <P>(request: CfnRequest<P>): P => request.ResourceProperties

/**
 * Properties declared before the change for Update requests, `undefined` for the others
 */
export const oldResourceProperties = <P>(request: CfnRequest<P>): P | undefined =>
    request.RequestType === "Update" ? request.OldResourceProperties : undefined

import JSONBig from "json-bigint";
import { CfnRequest, CfnResponse, CfnResponseCommon } from "./lib/cloud-formation-types";
import { EncodeError, reasonOf } from "./errors";
import { physicalResourceId } from "./cfn-request";
import { PhysicalResourceIdSuffixProvider } from "./resource-properties";

/**
 * Settled result of the provider's handler
 */
export type HandlerOutcome<S> =
    | {
        successful: true,
        /**
         * Value to report as `Data`, if any
         */
        value: S | undefined
    }
    | {
        successful: false,
        error: unknown
    }

/**
 * Identity fields of the response to a request. Delete requests keep the physical ID CloudFormation sent,
 * the others get the one derived as described in `physicalResourceId`.
 */
export const responseIdentity = <P>(
    request: CfnRequest<P>,
    suffixProvider: PhysicalResourceIdSuffixProvider<P>
): CfnResponseCommon => ({
    RequestId: request.RequestId,
    LogicalResourceId: request.LogicalResourceId,
    StackId: request.StackId,
    PhysicalResourceId: physicalResourceId(request, suffixProvider)
})

const toJsonValue = (value: unknown): unknown => JSONBig.parse(JSONBig.stringify(value))

/**
 * Builds the response reporting an outcome under the given identity.
 * The handler's value is converted to plain JSON data here: if it can't be, the response goes without `Data`
 * and `onDataDropped` receives the conversion error.
 */
export const buildResponse = <S>(
    identity: CfnResponseCommon,
    outcome: HandlerOutcome<S>,
    onDataDropped: (error: unknown) => void = () => undefined
): CfnResponse => {
    if (!outcome.successful)
        return { Status: "FAILED", Reason: reasonOf(outcome.error), ...identity }
    if (outcome.value === undefined || outcome.value === null)
        return { Status: "SUCCESS", ...identity }
    let data: unknown
    try {
        data = toJsonValue(outcome.value)
    } catch (e) {
        onDataDropped(e)
        return { Status: "SUCCESS", ...identity }
    }
    return data === undefined || data === null ?
        { Status: "SUCCESS", ...identity } :
        { Status: "SUCCESS", ...identity, Data: data }
}

/**
 * Builds the response reporting the outcome of a request. Identity fields are copied from the request,
 * the physical resource ID is derived as described in `physicalResourceId`.
 */
export const intoResponse = <P, S>(
    request: CfnRequest<P>,
    outcome: HandlerOutcome<S>,
    suffixProvider: PhysicalResourceIdSuffixProvider<P>,
    onDataDropped?: (error: unknown) => void
): CfnResponse => buildResponse(responseIdentity(request, suffixProvider), outcome, onDataDropped)

/**
 * Serializes the response in the form CloudFormation expects. Big integers in `Data` are kept as JSON numbers.
 * @throws EncodeError if the response can't be serialized
 */
export const encodeResponse = (response: CfnResponse): string => {
    const ordered = response.Status === "FAILED" ?
        {
            Status: response.Status,
            Reason: response.Reason,
            RequestId: response.RequestId,
            LogicalResourceId: response.LogicalResourceId,
            StackId: response.StackId,
            PhysicalResourceId: response.PhysicalResourceId
        } :
        {
            Status: response.Status,
            RequestId: response.RequestId,
            LogicalResourceId: response.LogicalResourceId,
            StackId: response.StackId,
            PhysicalResourceId: response.PhysicalResourceId,
            ...(response.NoEcho === undefined ? {} : { NoEcho: response.NoEcho }),
            ...(response.Data === undefined ? {} : { Data: response.Data })
        }
    try {
        return JSONBig.stringify(ordered)
    } catch (e) {
        throw new EncodeError(`Unable to serialize the ${response.Status} response: ${reasonOf(e)}`, e)
    }
}

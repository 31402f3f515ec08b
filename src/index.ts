import { CfnRequest, CfnResponseCommon } from "./lib/cloud-formation-types";
import { ResourcePropertiesType } from "./resource-properties";
import { decodeRequest } from "./cfn-request";
import { HandlerOutcome, buildResponse, encodeResponse, responseIdentity } from "./cfn-response";
import { deliverResponse } from "./response-delivery";
import { reasonOf } from "./errors";

/**
 * Provisioning logic of a custom resource. Receives the decoded request and returns the data to report
 * in the response (`undefined` for none). A thrown error turns into a FAILED response with the error's
 * message as the reason.
 */
export type CfnHandler<P, S> = (request: CfnRequest<P>) => Promise<S | undefined>

/**
 * Optional settings of the provider
 */
export type ProviderProperties = {
    /**
     * Logs the progress of the request to the console. If not set, the `CFN_PROVIDER_LOGGING` environment
     * variable decides, logging is disabled only when it's `off`
     */
    logging?: boolean,
    /**
     * Optional asynchronous function called if the handler fails, before the failure is reported to CloudFormation
     * @param error Error thrown by the handler
     * @param request Request that the handler failed to process
     */
    errorHandler?: (error: unknown, request: CfnRequest<unknown>) => Promise<void>
}

const loggingEnabled = (props: ProviderProperties) =>
    props.logging ?? process.env.CFN_PROVIDER_LOGGING !== "off"

const runHandler = async <P, S>(
    handler: CfnHandler<P, S>,
    request: CfnRequest<P>,
    props: ProviderProperties
): Promise<HandlerOutcome<S>> => {
    try {
        return { successful: true, value: await handler(request) }
    } catch (e) {
        if (loggingEnabled(props)) {
            console.error(`Handler error: ${reasonOf(e)}`)
            if (e instanceof Error) console.error(e.stack)
        }
        if (props.errorHandler) {
            try {
                await props.errorHandler(e, request)
            } catch (handlerError) {
                if (loggingEnabled(props)) console.warn("Error handler failed", handlerError)
            }
        }
        return { successful: false, error: e }
    }
}

const sendOutcome = async <S>(
    responseUrl: string,
    identity: CfnResponseCommon,
    outcome: HandlerOutcome<S>,
    props: ProviderProperties
): Promise<void> => {
    const logging = loggingEnabled(props)
    const response = buildResponse(identity, outcome, error => {
        if (logging) console.warn(`Response data dropped, it can't be converted to JSON: ${reasonOf(error)}`)
    })
    try {
        const body = encodeResponse(response)
        if (logging)
            console.log(`Sending CloudFormation response: ${response.Status} for ${response.LogicalResourceId} (${response.PhysicalResourceId})`)
        const statusCode = await deliverResponse(responseUrl, body)
        if (logging) console.log(`CloudFormation response delivered with status ${statusCode}`)
    } catch (e) {
        if (logging) console.error(`Failed to report status ${response.Status} to CloudFormation: ${reasonOf(e)}`)
        throw e
    }
}

/**
 * Reports an already settled outcome of a request to CloudFormation: builds the response,
 * serializes it and PUTs it to the request's `ResponseURL`
 * @param request Request the outcome belongs to
 * @param outcome Result of the provisioning logic
 * @param propertiesType Supplies the suffix of the derived physical resource ID
 * @throws EncodeError if the response can't be serialized, nothing is sent in that case
 * @throws DeliveryError if the PUT fails or doesn't answer with a 2xx status
 */
export const reportOutcome = async <P, S>(
    request: CfnRequest<P>,
    outcome: HandlerOutcome<S>,
    propertiesType: ResourcePropertiesType<P>,
    props: ProviderProperties = {}
): Promise<void> =>
    sendOutcome(request.ResponseURL, responseIdentity(request, propertiesType), outcome, props)

/**
 * Runs the provisioning logic for a decoded request and reports its outcome to CloudFormation.
 *
 * The response URL and the identity of the response, physical resource ID included, are taken from the request
 * before the handler runs, so the handler can't alter them.
 *
 * The returned promise settles with the handler's own result only once CloudFormation has been informed:
 * - if delivery succeeded, it resolves with the handler's value or rejects with the handler's error;
 * - if the response couldn't be serialized or delivered, it rejects with the `EncodeError` or `DeliveryError`,
 *   and a handler error is then only visible in the FAILED response that was sent.
 *
 * @param handler Provisioning logic
 * @param request Decoded request
 * @param propertiesType Properties type the request was decoded with
 * @param props Optional settings
 */
export const processRequest = async <P, S>(
    handler: CfnHandler<P, S>,
    request: CfnRequest<P>,
    propertiesType: ResourcePropertiesType<P>,
    props: ProviderProperties = {}
): Promise<S | undefined> => {
    const responseUrl = request.ResponseURL
    const identity = responseIdentity(request, propertiesType)
    const outcome = await runHandler(handler, request, props)
    await sendOutcome(responseUrl, identity, outcome, props)
    if (!outcome.successful) throw outcome.error
    return outcome.value
}

/**
 * Creates the lambda entry point of a custom resource provider
 * @param propertiesType Describes the resource properties: `schemaProperties`, `customProperties`, `optionalProperties`,
 * `noProperties` or `ignoredProperties`
 * @param handler Provisioning logic
 * @param props Optional settings
 * @returns Function to export as the lambda handler. Rejects with a `DecodeError` without contacting
 * CloudFormation if the event can't be decoded
 */
export const cfnResourceProvider = <P, S>(
    propertiesType: ResourcePropertiesType<P>,
    handler: CfnHandler<P, S>,
    props: ProviderProperties = {}
): (event: unknown) => Promise<S | undefined> =>
    async (event: unknown) => processRequest(handler, decodeRequest(event, propertiesType), propertiesType, props)

export * from "./lib/cloud-formation-types"
export * from "./errors"
export * from "./resource-properties"
export * from "./cfn-request"
export * from "./cfn-response"
export * from "./response-delivery"

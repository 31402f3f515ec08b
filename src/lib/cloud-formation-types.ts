/**
 * CloudFormation Custom Resource request and response shapes
 * http://docs.aws.amazon.com/AWSCloudFormation/latest/UserGuide/crpg-ref.html
 */

export type CfnRequestType = "Create" | "Update" | "Delete"

export const REQUEST_TYPES: readonly CfnRequestType[] = ["Create", "Update", "Delete"]

export type CfnResponseStatus = "SUCCESS" | "FAILED"

/**
 * Fields shared by every lifecycle request
 */
export interface CfnRequestCommon<P> {
    /**
     * Unique ID of the request
     */
    RequestId: string
    /**
     * Pre-signed URL receiving the response
     */
    ResponseURL: string
    /**
     * Template developer-chosen resource type, like `Custom::MyResource`
     */
    ResourceType: string
    /**
     * Name (logical ID) of the resource in the template
     */
    LogicalResourceId: string
    /**
     * ARN of the stack containing the resource, ending with the stack GUID
     */
    StackId: string
    /**
     * Properties set by the template developer, decoded into the provider's own type
     */
    ResourceProperties: P
}

export interface CfnCreateRequest<P> extends CfnRequestCommon<P> {
    RequestType: "Create"
}

export interface CfnUpdateRequest<P> extends CfnRequestCommon<P> {
    RequestType: "Update"
    /**
     * Physical ID returned by the previous response for this resource
     */
    PhysicalResourceId: string
    /**
     * Properties as they were declared before the update
     */
    OldResourceProperties: P
}

export interface CfnDeleteRequest<P> extends CfnRequestCommon<P> {
    RequestType: "Delete"
    PhysicalResourceId: string
}

export type CfnRequest<P> =
    | CfnCreateRequest<P>
    | CfnUpdateRequest<P>
    | CfnDeleteRequest<P>

/**
 * Identity fields copied from the request into every response
 */
export interface CfnResponseCommon {
    RequestId: string
    LogicalResourceId: string
    StackId: string
    PhysicalResourceId: string
}

export interface CfnSuccessResponse extends CfnResponseCommon {
    Status: "SUCCESS"
    NoEcho?: boolean
    Data?: unknown
}

export interface CfnFailedResponse extends CfnResponseCommon {
    Status: "FAILED"
    Reason: string
}

export type CfnResponse =
    | CfnSuccessResponse
    | CfnFailedResponse

/**
 * Inbound event or its resource properties can't be decoded into the expected request type
 */
export class DecodeError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "DecodeError"
    }
}

/**
 * The response built for CloudFormation can't be serialized. Nothing was delivered
 */
export class EncodeError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause })
        this.name = "EncodeError"
    }
}

/**
 * The response couldn't be delivered to the pre-signed URL, or the URL answered with a non-2xx status
 */
export class DeliveryError extends Error {
    constructor(
        message: string,
        public readonly statusCode?: number,
        cause?: unknown
    ) {
        super(message, { cause })
        this.name = "DeliveryError"
    }
}

/**
 * Human-readable text of an error, as it is reported in the `Reason` field of a failed response
 */
export const reasonOf = (error: unknown): string =>
    error instanceof Error ? error.message : String(error)

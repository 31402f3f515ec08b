import * as http from "http";
import * as https from "https";
import { DeliveryError, reasonOf } from "./errors";

/**
 * Sends the serialized response to the pre-signed URL with a single PUT.
 * `Content-Type` is explicitly empty, the URL signature covers it.
 * Every call opens its own connection, nothing is pooled or retried.
 * @param responseUrl `ResponseURL` of the request
 * @param body Serialized response
 * @returns Status code of the successful PUT
 * @throws DeliveryError on transport failure or if the status isn't 2xx
 */
export const deliverResponse = (responseUrl: string, body: string): Promise<number> =>
    new Promise<number>((resolve, reject) => {
        let url: URL
        try {
            url = new URL(responseUrl)
        } catch (e) {
            reject(new DeliveryError(`Invalid response URL ${responseUrl}`, undefined, e))
            return
        }
        if (url.protocol !== "https:" && url.protocol !== "http:") {
            reject(new DeliveryError(`Unsupported protocol ${url.protocol} in the response URL`))
            return
        }

        const options: http.RequestOptions = {
            method: "PUT",
            agent: false,
            headers: {
                "Content-Type": "",
                "Content-Length": Buffer.byteLength(body)
            }
        }
        const onResponse = (res: http.IncomingMessage) => {
            const statusCode = res.statusCode ?? 0
            res.on("data", () => undefined)
            res.on("end", () => {
                if (statusCode >= 200 && statusCode < 300) resolve(statusCode)
                else reject(new DeliveryError(`Unexpected status code ${statusCode} from the response URL`, statusCode))
            })
            res.on("error", err => reject(new DeliveryError(`Response stream failed: ${reasonOf(err)}`, statusCode, err)))
        }
        const req = url.protocol === "https:" ?
            https.request(url, options, onResponse) :
            http.request(url, options, onResponse)

        req.on("error", err => reject(new DeliveryError(`Failed to send the response: ${reasonOf(err)}`, undefined, err)))

        req.write(body)
        req.end()
    })

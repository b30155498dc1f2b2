import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { IOperationStatus, IXmlRecord, XmlValue } from './interfaces';
import { AuthenticationError } from './Errors/AuthenticationError';
import { OperationError } from './Errors/OperationError';
import { ParseError } from './Errors/ParseError';

export const AUTHENTICATION_SUCCESS = 'Authentication Successful';
export const SUCCESS_CODE = '200';

// attributes as "@name", text as "#text", every value left as string
const xmlParser = new XMLParser({
    ignoreAttributes: false,
    ignoreDeclaration: true,
    attributeNamePrefix: '@',
    textNodeName: '#text',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true
});

export function isXmlRecord(value: unknown): value is IXmlRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Query payloads hold nothing, one record or a list of records depending
 * on how many objects the appliance returned.
 */
export function toRecords(payload: XmlValue | undefined): Array<IXmlRecord> {
    if (payload === undefined) {
        return [];
    }
    return (Array.isArray(payload) ? payload : [payload]).filter(isXmlRecord);
}

export class ResponseInterpreter {
    /**
     * Decodes the reply and returns its `Response` element.
     */
    public parse(raw: string): IXmlRecord {
        const validation = XMLValidator.validate(raw);
        if (validation !== true) {
            throw new ParseError(`malformed reply : ${validation.err.msg}`, raw);
        }

        const parsed: unknown = xmlParser.parse(raw);
        const response = isXmlRecord(parsed) ? parsed.Response : undefined;
        if (!isXmlRecord(response)) {
            throw new ParseError('reply has no Response element', raw);
        }
        return response;
    }

    /**
     * Authentication is the only check for queries, the payload is returned as sent.
     */
    public interpretQuery(raw: string, entityType: string): XmlValue | undefined {
        const response = this.authenticate(raw);
        return response[entityType];
    }

    public interpretStatus(raw: string, entityType: string): IOperationStatus {
        const response = this.authenticate(raw);

        const entity = response[entityType];
        if (entity === undefined) {
            // the whole request was refused
            if (response.Status !== undefined) {
                return this.checkStatus(response.Status, 'Response', raw);
            }
            throw new ParseError(`reply has no ${entityType} element`, raw);
        }

        const statuses = (Array.isArray(entity) ? entity : [entity]).map((node) => {
            const status = isXmlRecord(node) ? node.Status : undefined;
            if (status === undefined) {
                throw new ParseError(`${entityType} reply has no Status`, raw);
            }
            return this.checkStatus(status, entityType, raw);
        });

        return statuses[0];
    }

    private authenticate(raw: string): IXmlRecord {
        const response = this.parse(raw);

        const login = response.Login;
        if (login === undefined && response.Status !== undefined) {
            // request refused before authentication, e.g. from a non allowed address
            this.checkStatus(response.Status, 'Response', raw);
        }

        const status = isXmlRecord(login) ? login.status : undefined;
        if (typeof status !== 'string') {
            throw new ParseError('reply has no Login status', raw);
        }
        if (status !== AUTHENTICATION_SUCCESS) {
            throw new AuthenticationError(status);
        }

        return response;
    }

    private checkStatus(node: XmlValue, entityType: string, raw: string): IOperationStatus {
        const code = isXmlRecord(node) ? node['@code'] : undefined;
        if (!isXmlRecord(node) || typeof code !== 'string') {
            throw new ParseError(`${entityType} Status has no code`, raw);
        }

        const text = node['#text'];
        const message = typeof text === 'string' ? text : '';
        if (code !== SUCCESS_CODE) {
            throw new OperationError(code, message, entityType);
        }

        return { code, message };
    }
}

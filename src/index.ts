//import global first, to set env
import './global';

export * from './interfaces';
export * from './firewallObjects';
export * from './schemas';
export { XmlNode, newElement } from './XmlNode';
export { FieldSerializer } from './FieldSerializer';
export { Command } from './Command';
export { RequestBuilder } from './RequestBuilder';
export type { IEnvelopeSource } from './RequestBuilder';
export { ResponseInterpreter, toRecords, isXmlRecord, AUTHENTICATION_SUCCESS, SUCCESS_CODE } from './ResponseInterpreter';
export { AxiosTransport, DEFAULT_TIMEOUT } from './AxiosTransport';
export { Session, API_PATH } from './Session';
export { Firewall } from './Firewall';
export { loadSessionOptions, DEFAULT_ADDRESS, DEFAULT_PORT } from './config';
export { logger } from './logger';
export { CustomError } from './Errors/CustomError';
export { ErrorWithCode } from './Errors/ErrorWithCode';
export { AuthenticationError } from './Errors/AuthenticationError';
export { OperationError } from './Errors/OperationError';
export { MissingFieldError } from './Errors/MissingFieldError';
export { ValidationError } from './Errors/ValidationError';
export { TransportError } from './Errors/TransportError';
export { ParseError } from './Errors/ParseError';

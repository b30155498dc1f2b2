import type { Command } from './Command';
import { AxiosTransport } from './AxiosTransport';
import { loadSessionOptions, DEFAULT_ADDRESS, DEFAULT_PORT } from './config';
import type { FieldValues, IEntitySchema, IMutateOptions, IOperationStatus, ISessionOptions, ITransport, XmlValue } from './interfaces';
import { XmlNode } from './XmlNode';
import { RequestBuilder } from './RequestBuilder';
import { ResponseInterpreter } from './ResponseInterpreter';
import { TransportError } from './Errors/TransportError';
import logger from './logger';

export const API_PATH = '/webconsole/APIController';

/**
 * Connection to one appliance. Credentials are fixed at construction and
 * copied into the Login block of every request; nothing else is kept
 * between calls, so one session can serve concurrent callers.
 */
export class Session {
    readonly username: string;
    readonly address: string;
    readonly port: string;
    readonly strictSSL: boolean;

    private readonly password: string;
    private readonly authTemplate: XmlNode;
    private readonly transport: ITransport;
    private readonly builder: RequestBuilder;
    private readonly interpreter = new ResponseInterpreter();

    static fromEnv(env: NodeJS.ProcessEnv = process.env, transport?: ITransport): Session {
        return new Session({ ...loadSessionOptions(env), transport });
    }

    constructor(options: ISessionOptions) {
        this.username = options.username;
        this.password = options.password;
        this.address = options.address ?? DEFAULT_ADDRESS;
        this.port = String(options.port ?? DEFAULT_PORT);
        this.strictSSL = options.strictSSL ?? false;
        this.transport = options.transport ?? new AxiosTransport(options.timeout);

        this.authTemplate = new XmlNode('Request');
        const login = this.authTemplate.appendChild('Login');
        login.appendChild('Username', this.username);
        login.appendChild('Password', this.password);

        this.builder = new RequestBuilder(this);
    }

    get baseUrl(): string {
        return `https://${this.address}:${this.port}${API_PATH}`;
    }

    public createEnvelope(): XmlNode {
        return this.authTemplate.clone();
    }

    public getRequestBuilder(): RequestBuilder {
        return this.builder;
    }

    public buildUrl(command: Command): string {
        return `${this.baseUrl}?reqxml=${encodeURIComponent(command.toXml())}`;
    }

    public async query(entityType: string): Promise<XmlValue | undefined> {
        const command = this.builder.buildQuery(entityType);
        const raw = await this.send(command);
        return this.interpret(command, () => this.interpreter.interpretQuery(raw, entityType));
    }

    public async mutate(schema: IEntitySchema, values: FieldValues, options?: IMutateOptions): Promise<IOperationStatus> {
        const command = this.builder.buildMutate(schema, values, options);
        const raw = await this.send(command);
        return this.interpret(command, () => this.interpreter.interpretStatus(raw, schema.entityType));
    }

    public async delete(schema: IEntitySchema, key: string): Promise<IOperationStatus> {
        const command = this.builder.buildDelete(schema, key);
        const raw = await this.send(command);
        return this.interpret(command, () => this.interpreter.interpretStatus(raw, schema.entityType));
    }

    public async send(command: Command): Promise<string> {
        logger.debug('Session.send() : %s to %s', command.toString(), this.address);

        try {
            return await this.transport.send(this.buildUrl(command), !this.strictSSL);
        } catch (e) {
            if (e instanceof TransportError) {
                throw e;
            }
            throw new TransportError(`request to appliance failed : ${e instanceof Error ? e.message : String(e)}`, e);
        }
    }

    private interpret<T>(command: Command, interpretation: () => T): T {
        try {
            const result = interpretation();
            logger.debug('Session.interpret() : %s succeeded', command.toString());
            return result;
        } catch (e) {
            logger.warn('Session.interpret() : %s failed : %s', command.toString(), e instanceof Error ? e.message : String(e));
            throw e;
        }
    }
}

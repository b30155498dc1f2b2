import { ResponseInterpreter, toRecords } from '../src/ResponseInterpreter';
import { AuthenticationError } from '../src/Errors/AuthenticationError';
import { OperationError } from '../src/Errors/OperationError';
import { ParseError } from '../src/Errors/ParseError';
import { LOGIN_FAILED, queryReply, statusReply } from './helpers/replies';

function failure(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error('expected a failure');
}

describe('ResponseInterpreter', () => {
    const interpreter = new ResponseInterpreter();

    describe('authentication', () => {
        it('should refuse a failed login whatever the entity status', () => {
            const raw = statusReply('IPHost', '200', 'Configuration applied successfully.', LOGIN_FAILED);
            const error = failure(() => interpreter.interpretStatus(raw, 'IPHost'));

            expect(error).toBeInstanceOf(AuthenticationError);
            expect(error).toHaveProperty('status', 'Authentication Failure');
        });

        it('should refuse a failed login on queries', () => {
            const raw = queryReply('<IPHost><Name>H1</Name></IPHost>', LOGIN_FAILED);

            expect(() => interpreter.interpretQuery(raw, 'IPHost')).toThrow(new AuthenticationError('Authentication Failure'));
        });

        it('should raise the status of a request refused before login', () => {
            const raw = '<Response><Status code="534">API operations are not allowed from the requester IP address</Status></Response>';
            const error = failure(() => interpreter.interpretStatus(raw, 'IPHost'));

            expect(error).toBeInstanceOf(OperationError);
            expect(error).toHaveProperty('code', '534');
            expect(error).toHaveProperty('statusMessage', 'API operations are not allowed from the requester IP address');
            expect(error).toHaveProperty('entityType', 'Response');
            expect(() => interpreter.interpretQuery(raw, 'IPHost')).toThrow(OperationError);
        });

        it('should still need a login when the refusal status is a success', () => {
            expect(() => interpreter.interpretStatus('<Response><Status code="200">ok</Status></Response>', 'IPHost')).toThrow(
                new ParseError('reply has no Login status', '')
            );
        });

        it('should fail when the login status is missing', () => {
            const raw = '<Response><IPHost><Status code="200">ok</Status></IPHost></Response>';

            expect(() => interpreter.interpretStatus(raw, 'IPHost')).toThrow(ParseError);
        });
    });

    describe('status', () => {
        it('should return code and message of a success', () => {
            const raw = statusReply('IPHost', '200', 'Configuration applied successfully.');

            expect(interpreter.interpretStatus(raw, 'IPHost')).toEqual({ code: '200', message: 'Configuration applied successfully.' });
        });

        it('should raise the appliance code and message unchanged', () => {
            const raw = statusReply('IPHost', '502', 'Operation failed. Entity having same name already exists.');
            const error = failure(() => interpreter.interpretStatus(raw, 'IPHost'));

            expect(error).toBeInstanceOf(OperationError);
            expect(error).toHaveProperty('code', '502');
            expect(error).toHaveProperty('statusMessage', 'Operation failed. Entity having same name already exists.');
            expect(error).toHaveProperty('message', 'Operation failed. Entity having same name already exists.');
            expect(error).toHaveProperty('entityType', 'IPHost');
        });

        it('should read a status without message', () => {
            const raw = queryReply('<Zone><Status code="200"/></Zone>');

            expect(interpreter.interpretStatus(raw, 'Zone')).toEqual({ code: '200', message: '' });
        });

        it('should use the response status when the entity is missing', () => {
            const raw = queryReply('<Status code="529">Input request file is Invalid</Status>');
            const error = failure(() => interpreter.interpretStatus(raw, 'IPHost'));

            expect(error).toBeInstanceOf(OperationError);
            expect(error).toHaveProperty('code', '529');
            expect(error).toHaveProperty('entityType', 'Response');
        });

        it('should trim whitespace around status and login texts', () => {
            const raw =
                '<Response>\n  <Login>\n    <status>  Authentication Successful\n</status>\n  </Login>\n' +
                '  <IPHost><Status code="502">  Entity exists.  </Status></IPHost>\n</Response>';

            expect(() => interpreter.interpretStatus(raw, 'IPHost')).toThrow(new OperationError('502', 'Entity exists.'));
        });

        it('should fail when neither entity nor status is present', () => {
            expect(() => interpreter.interpretStatus(queryReply(''), 'IPHost')).toThrow(new ParseError('reply has no IPHost element', ''));
        });

        it('should fail when the entity has no status', () => {
            expect(() => interpreter.interpretStatus(queryReply('<IPHost><Name>H1</Name></IPHost>'), 'IPHost')).toThrow(ParseError);
        });

        it('should fail when the status has no code', () => {
            expect(() => interpreter.interpretStatus(queryReply('<IPHost><Status>done</Status></IPHost>'), 'IPHost')).toThrow(
                'IPHost Status has no code'
            );
        });

        it('should check every status of a repeated entity', () => {
            const raw = queryReply(
                '<IPHost><Status code="200">Configuration applied successfully.</Status></IPHost>' +
                    '<IPHost><Status code="541">Operation failed. Entity is in use.</Status></IPHost>'
            );

            expect(() => interpreter.interpretStatus(raw, 'IPHost')).toThrow(new OperationError('541', 'Operation failed. Entity is in use.'));
        });
    });

    describe('query', () => {
        it('should return a single record as sent', () => {
            const raw = queryReply(
                '<IPHost><Name>H1</Name><IPFamily>IPv4</IPFamily><HostType>IP</HostType><IPAddress>10.0.0.1</IPAddress></IPHost>'
            );

            expect(interpreter.interpretQuery(raw, 'IPHost')).toEqual({ Name: 'H1', IPFamily: 'IPv4', HostType: 'IP', IPAddress: '10.0.0.1' });
        });

        it('should keep numbers as strings and lists as lists', () => {
            const raw = queryReply(
                '<LAG><Name>LAG1</Name><MTU>1500</MTU><MemberInterface><Interface>PortF</Interface><Interface>PortG</Interface></MemberInterface></LAG>' +
                    '<LAG><Name>LAG2</Name><MTU>9000</MTU></LAG>'
            );

            expect(interpreter.interpretQuery(raw, 'LAG')).toEqual([
                { Name: 'LAG1', MTU: '1500', MemberInterface: { Interface: ['PortF', 'PortG'] } },
                { Name: 'LAG2', MTU: '9000' }
            ]);
        });

        it('should return nothing when no object exists', () => {
            expect(interpreter.interpretQuery(queryReply(''), 'IPHost')).toBeUndefined();
        });

        it('should ignore the entity status', () => {
            const raw = queryReply('<IPHost><Status code="500">No. of records Zero.</Status></IPHost>');

            expect(interpreter.interpretQuery(raw, 'IPHost')).toEqual({ Status: { '@code': '500', '#text': 'No. of records Zero.' } });
        });
    });

    describe('parse', () => {
        it('should keep the raw reply of malformed XML', () => {
            const raw = '<Response><Login>';
            const error = failure(() => interpreter.parse(raw));

            expect(error).toBeInstanceOf(ParseError);
            expect(error).toHaveProperty('raw', raw);
            expect(error).toHaveProperty('privateMessage', raw);
        });

        it('should need a Response root', () => {
            expect(() => interpreter.parse('<html><body>Not found</body></html>')).toThrow(new ParseError('reply has no Response element', ''));
        });
    });

    describe('toRecords', () => {
        it('should always give a list', () => {
            expect(toRecords(undefined)).toEqual([]);
            expect(toRecords({ Name: 'H1' })).toEqual([{ Name: 'H1' }]);
            expect(toRecords([{ Name: 'H1' }, { Name: 'H2' }])).toEqual([{ Name: 'H1' }, { Name: 'H2' }]);
            expect(toRecords('')).toEqual([]);
        });
    });
});

import { errorBody } from './jsonError';

describe('errorBody', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('wraps the code and message with the server time in seconds', () => {
        jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_500);
        expect(errorBody('not_found', 'nf_run_meta.json not found')).toEqual({
            error: { code: 'not_found', message: 'nf_run_meta.json not found' },
            server_time_utc: 1_700_000_000.5,
        });
    });
});

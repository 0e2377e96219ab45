import { MarketConditionFilter } from '../../../../src/application/services/market/MarketConditionFilter';
import { makeConfig } from '../../../helpers/fakes';

describe('MarketConditionFilter', () => {
    const config = makeConfig({
        newsBlackouts: [{ start: '2026-03-02T13:30:00.000Z', durationMinutes: 30 }]
    });

    it('allows trading outside blackout windows', () => {
        const filter = new MarketConditionFilter(config);

        expect(filter.check('R_100', new Date('2026-03-02T13:29:59Z'))).toEqual({ allowed: true });
        expect(filter.check('R_100', new Date('2026-03-02T14:00:01Z'))).toEqual({ allowed: true });
    });

    it('vetoes trading inside a window, both ends included', () => {
        const filter = new MarketConditionFilter(config);
        const veto = { allowed: false, reason: 'news blackout until 2026-03-02T14:00:00.000Z' };

        expect(filter.check('R_100', new Date('2026-03-02T13:30:00Z'))).toEqual(veto);
        expect(filter.check('R_50', new Date('2026-03-02T14:00:00Z'))).toEqual(veto);
    });

    it('accepts windows added at run time', () => {
        const filter = new MarketConditionFilter(makeConfig());
        filter.addBlackout(new Date('2026-03-02T08:00:00Z'), 15);

        expect(filter.check('R_100', new Date('2026-03-02T08:10:00Z'))).toEqual({
            allowed: false,
            reason: 'news blackout until 2026-03-02T08:15:00.000Z'
        });
    });
});

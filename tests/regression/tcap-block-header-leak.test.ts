import { TcapReader } from '../../src/iq/readers/tcap.js';
import { buildTcap, tcapI, writeFixture } from '../helpers/fixtures.js';

describe('Regression: TCAP windows after the first block', () => {
    it('never returns block header bytes as samples', async () => {
        const reader = new TcapReader(await writeFixture('capture.dat', buildTcap(3)), { tcap: { blockCount: 3 } });
        // starts in block 0, ends in block 2
        const result = await reader.read({ frameLength: 20000, frameCount: 3, startFrame: 2 });
        expect(result.samples.length).toBe(60000);

        const iq = result.samples.iq;
        const firstWrong = Array.from({ length: result.samples.length }, (_, k) => k)
            .findIndex((k) => iq[2 * k] !== tcapI(20000 + k) * 0.0625);
        expect(firstWrong).toBe(-1);
    });
});

import { EmissionSink } from '../../src/services/emissionSink';
import { MetricsAggregator } from '../../src/services/metricsAggregator';
import { MetricsReporter } from '../../src/services/metricsReporter';
import { RecordingCollector } from '../helpers/recordingCollector';

describe('MetricsReporter', () => {
    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    const setup = () => {
        const metrics = new MetricsAggregator();
        const sink = new EmissionSink(new RecordingCollector(), { metrics });
        const emit = jest.spyOn(sink, 'emit').mockImplementation(() => undefined);
        return { metrics, reporter: new MetricsReporter(metrics, sink, 1000), emit };
    };

    it('emits a snapshot on every interval', () => {
        const { metrics, reporter, emit } = setup();
        metrics.recordOutcome('approved');

        reporter.start();
        jest.advanceTimersByTime(2500);

        expect(emit).toHaveBeenCalledTimes(2);
        expect(emit).toHaveBeenLastCalledWith(
            expect.objectContaining({ outcomes: { approved: 1, flagged: 0 } })
        );
        reporter.stop();
    });

    it('reports once more when stopped', () => {
        const { reporter, emit } = setup();

        reporter.start();
        reporter.stop();
        reporter.stop();
        jest.advanceTimersByTime(5000);

        expect(emit).toHaveBeenCalledTimes(1);
    });

    it('ignores a second start', () => {
        const { reporter, emit } = setup();

        reporter.start();
        reporter.start();
        jest.advanceTimersByTime(1000);

        expect(emit).toHaveBeenCalledTimes(1);
        reporter.stop();
    });
});

import {
    alertsEnabledWithoutPanel,
    isFlagEnabled,
    resolveRunSettings,
    type ControlPanelSnapshot,
} from '../runSettings.js';

function panel(overrides: Partial<ControlPanelSnapshot> = {}): ControlPanelSnapshot {
    return { pipeline: 'ON', backup: '', alerts: '', forecast: '', ...overrides };
}

const NO_OVERRIDES = { ENABLE_BACKUP: undefined, ENABLE_ALERTS: undefined, ENABLE_FORECAST: undefined };

describe('isFlagEnabled', () => {
    it('accepts ON and TRUE in any case', () => {
        expect(isFlagEnabled('ON')).toBe(true);
        expect(isFlagEnabled('on')).toBe(true);
        expect(isFlagEnabled(' True ')).toBe(true);
    });

    it('treats everything else as off', () => {
        expect(isFlagEnabled('OFF')).toBe(false);
        expect(isFlagEnabled('FALSE')).toBe(false);
        expect(isFlagEnabled('yes')).toBe(false);
        expect(isFlagEnabled('')).toBe(false);
        expect(isFlagEnabled(null)).toBe(false);
        expect(isFlagEnabled(undefined)).toBe(false);
    });
});

describe('resolveRunSettings', () => {
    it('uses the defaults when the cells are blank', () => {
        expect(resolveRunSettings(NO_OVERRIDES, panel())).toEqual({
            pipelineEnabled: true,
            backupEnabled: true,
            alertsEnabled: true,
            forecastEnabled: false,
        });
    });

    it('reads the pipeline switch from the panel only', () => {
        expect(resolveRunSettings(NO_OVERRIDES, panel({ pipeline: 'OFF' })).pipelineEnabled).toBe(false);
        expect(resolveRunSettings(NO_OVERRIDES, panel({ pipeline: '' })).pipelineEnabled).toBe(false);
    });

    it('lets a non-blank cell override the default', () => {
        const settings = resolveRunSettings(NO_OVERRIDES, panel({ backup: 'OFF', forecast: 'ON' }));
        expect(settings.backupEnabled).toBe(false);
        expect(settings.forecastEnabled).toBe(true);
    });

    it('lets an environment override win over the cell', () => {
        const settings = resolveRunSettings(
            { ENABLE_BACKUP: true, ENABLE_ALERTS: false, ENABLE_FORECAST: undefined },
            panel({ backup: 'OFF', alerts: 'ON', forecast: 'TRUE' })
        );
        expect(settings.backupEnabled).toBe(true);
        expect(settings.alertsEnabled).toBe(false);
        expect(settings.forecastEnabled).toBe(true);
    });

    it('returns frozen settings', () => {
        expect(Object.isFrozen(resolveRunSettings(NO_OVERRIDES, panel()))).toBe(true);
    });
});

describe('alertsEnabledWithoutPanel', () => {
    it('defaults to on unless explicitly disabled', () => {
        expect(alertsEnabledWithoutPanel({ ENABLE_ALERTS: undefined })).toBe(true);
        expect(alertsEnabledWithoutPanel({ ENABLE_ALERTS: false })).toBe(false);
    });
});

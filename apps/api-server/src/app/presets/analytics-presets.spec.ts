import { detectPreset, effectivePreset, FALLBACK_PRESET_ID, getPresetById } from './analytics-presets';

describe('analytics presets', () => {
  const callLog = ['Date', 'Time', 'Caller', 'Call Type', 'Country Name', 'Call Status', 'Call Duration'];

  describe('detectPreset', () => {
    it('prefers the counsellor layout when To Name is present', () => {
      expect(detectPreset([...callLog, 'To Name'])?.id).toBe('counsellor-talktime');
    });

    it('picks the team layout without To Name', () => {
      expect(detectPreset(callLog)?.id).toBe('team-activity');
    });

    it('matches headers case-insensitively and tolerates a missing column', () => {
      expect(detectPreset(['owner', 'call duration', 'start time', 'Notes'])?.id).toBe('activity-feed');
      expect(detectPreset(callLog.filter((h) => h !== 'Call Status'))?.id).toBe('team-activity');
    });

    it('returns null when nothing fits', () => {
      expect(detectPreset(['Owner', 'Subject'])).toBeNull();
      expect(detectPreset([])).toBeNull();
    });
  });

  it('looks presets up by id', () => {
    expect(getPresetById('agent-activity')?.countLabel).toBe('Total Calls');
    expect(getPresetById('activity-feed')?.sortMode).toBe('SUM');
    expect(getPresetById('nope')).toBeUndefined();
  });

  it('falls back to the default preset', () => {
    expect(effectivePreset(null).id).toBe(FALLBACK_PRESET_ID);
    expect(effectivePreset('unknown').id).toBe(FALLBACK_PRESET_ID);
    expect(effectivePreset('team-activity').defaultIncludeMissing).toBe(true);
  });
});

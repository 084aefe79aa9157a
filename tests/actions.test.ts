import { describe, it, expect } from 'vitest';
import { classifyField, coerceNumericFields, flattenActions } from '../normalizers/index.js';
import type { InsightRecord } from '../schemas/index.js';
import { FlattenError } from '../src/errors.js';

describe('classifyField', () => {
  it('should tag action lists', () => {
    const result = classifyField('actions', [{ action_type: 'lead', value: '4' }]);

    expect(result).toEqual({ kind: 'actionList', entries: [{ action_type: 'lead', value: '4' }] });
  });

  it('should tag an action list whatever the entry values are', () => {
    const result = classifyField('actions', [
      { action_type: 'purchase', value: '3' },
      { action_type: 'lead', value: null },
      { action_type: 'view' },
    ]);

    expect(result).toEqual({
      kind: 'actionList',
      entries: [
        { action_type: 'purchase', value: '3' },
        { action_type: 'lead', value: null },
        { action_type: 'view', value: undefined },
      ],
    });
  });

  it('should tag strings, numbers and plain arrays as scalars', () => {
    expect(classifyField('spend', '12.50')).toEqual({ kind: 'scalar', value: '12.50' });
    expect(classifyField('clicks', 7)).toEqual({ kind: 'scalar', value: 7 });
    expect(classifyField('breakdowns', ['age', 'gender'])).toEqual({
      kind: 'scalar',
      value: ['age', 'gender'],
    });
  });

  it('should not tag arrays whose entries lack an action type', () => {
    const value = [{ id: '1', name: 'Creative' }];

    expect(classifyField('creatives', value)).toEqual({ kind: 'scalar', value });
  });

  it('should tag conversion objects as action maps', () => {
    expect(classifyField('conversions', { schedule_total: '296' })).toEqual({
      kind: 'actionMap',
      entries: [{ action_type: 'schedule_total', value: '296' }],
    });
  });

  it('should tag other objects as nested objects', () => {
    expect(classifyField('creative', { id: 'cr1' })).toEqual({ kind: 'object', fields: { id: 'cr1' } });
  });
});

describe('flattenActions', () => {
  it('should sum repeated action types and drop the source field', () => {
    const record: InsightRecord = {
      actions: [
        { action_type: 'purchase', value: '3' },
        { action_type: 'purchase', value: '2' },
      ],
    };

    const flat = flattenActions(record);

    expect(flat).toEqual({ action_purchase: 5 });
    expect(flat).not.toHaveProperty('actions');
  });

  it('should return a record without action lists unchanged', () => {
    const record: InsightRecord = {
      campaign_name: 'Spring Sale',
      spend: '100.50',
      impressions: '2000',
      date_start: '2024-01-01',
    };

    expect(flattenActions(record)).toEqual(record);
  });

  it('should produce the same output for any action ordering', () => {
    const forward: InsightRecord = {
      actions: [
        { action_type: 'lead', value: '1' },
        { action_type: 'purchase', value: '2' },
        { action_type: 'lead', value: '4' },
      ],
    };
    const reversed: InsightRecord = {
      actions: [
        { action_type: 'lead', value: '4' },
        { action_type: 'purchase', value: '2' },
        { action_type: 'lead', value: '1' },
      ],
    };

    expect(flattenActions(forward)).toEqual({ action_lead: 5, action_purchase: 2 });
    expect(flattenActions(reversed)).toEqual(flattenActions(forward));
  });

  it('should use short prefixes for known fields and the field name otherwise', () => {
    const record: InsightRecord = {
      spend: '42.00',
      actions: [{ action_type: 'purchase', value: '2' }],
      action_values: [{ action_type: 'purchase', value: '89.90' }],
      conversions: [{ action_type: 'schedule_total', value: '296' }],
      conversion_values: [{ action_type: 'schedule_total', value: '10' }],
      cost_per_action_type: [{ action_type: 'lead', value: '2.5' }],
      video_thruplay_watched_actions: [{ action_type: 'video_view', value: '30' }],
    };

    expect(flattenActions(record)).toEqual({
      spend: '42.00',
      action_purchase: 2,
      action_value_purchase: 89.9,
      conversion_schedule_total: 296,
      conversion_value_schedule_total: 10,
      cost_per_action_type_lead: 2.5,
      video_thruplay_watched_actions_video_view: 30,
    });
  });

  it('should keep sums separate per field', () => {
    const record: InsightRecord = {
      actions: [{ action_type: 'purchase', value: '1' }],
      action_values: [{ action_type: 'purchase', value: '20' }],
    };

    expect(flattenActions(record)).toEqual({ action_purchase: 1, action_value_purchase: 20 });
  });

  it('should accept numeric values and ignore attribution window keys', () => {
    const record: InsightRecord = {
      actions: [
        { action_type: 'link_click', value: 12, '7d_click': '10' },
        { action_type: 'link_click', value: ' 3 ' },
      ],
    };

    expect(flattenActions(record)).toEqual({ action_link_click: 15 });
  });

  it('should remove an empty action list without adding keys', () => {
    expect(flattenActions({ spend: '1', actions: [] })).toEqual({ spend: '1' });
  });

  it('should restrict emitted keys to the requested action types', () => {
    const record: InsightRecord = {
      actions: [
        { action_type: 'purchase', value: '2' },
        { action_type: 'lead', value: '7' },
      ],
    };

    expect(flattenActions(record, { actionTypes: ['lead'] })).toEqual({ action_lead: 7 });
  });

  it('should raise FlattenError for a non-numeric value', () => {
    const record: InsightRecord = {
      actions: [
        { action_type: 'lead', value: '1' },
        { action_type: 'purchase', value: 'abc' },
      ],
    };

    let thrown: unknown;
    try {
      flattenActions(record);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(FlattenError);
    expect(thrown).toMatchObject({ field: 'actions', actionType: 'purchase' });
  });

  it('should raise FlattenError instead of treating an empty value as zero', () => {
    const record: InsightRecord = { actions: [{ action_type: 'lead', value: '' }] };

    expect(() => flattenActions(record)).toThrow(
      'Non-numeric value "" for action type "lead" in field "actions"'
    );
  });

  it('should raise FlattenError for a null value instead of keeping the list', () => {
    const record: InsightRecord = {
      actions: [
        { action_type: 'purchase', value: '3' },
        { action_type: 'lead', value: null },
      ],
    };

    expect(() => flattenActions(record)).toThrow(
      'Non-numeric value null for action type "lead" in field "actions"'
    );
  });

  it('should raise FlattenError for an entry without a value', () => {
    const record: InsightRecord = { actions: [{ action_type: 'purchase' }] };

    let thrown: unknown;
    try {
      flattenActions(record);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(FlattenError);
    expect(thrown).toMatchObject({
      field: 'actions',
      actionType: 'purchase',
      message: 'Missing value for action type "purchase" in field "actions"',
    });
  });

  it('should skip filtered-out entries before checking their values', () => {
    const record: InsightRecord = {
      actions: [
        { action_type: 'purchase', value: '3' },
        { action_type: 'lead', value: null },
      ],
    };

    expect(flattenActions(record, { actionTypes: ['purchase'] })).toEqual({ action_purchase: 3 });
  });

  it('should flatten conversions given as objects', () => {
    const record: InsightRecord = {
      conversions: { schedule_total: '296', find_location_total: '1449' },
      conversion_values: { schedule_total: '12.5' },
    };

    expect(flattenActions(record)).toEqual({
      conversion_schedule_total: 296,
      conversion_find_location_total: 1449,
      conversion_value_schedule_total: 12.5,
    });
  });

  it('should raise FlattenError for a non-numeric conversion object value', () => {
    const record: InsightRecord = { conversions: { schedule_total: 'soon' } };

    expect(() => flattenActions(record)).toThrow(
      'Non-numeric value "soon" for action type "schedule_total" in field "conversions"'
    );
  });

  it('should expand other nested objects one level', () => {
    const record: InsightRecord = {
      ad_name: 'Banner',
      creative: { id: 'cr1', title: 'Hello' },
    };

    expect(flattenActions(record)).toEqual({
      ad_name: 'Banner',
      creative_id: 'cr1',
      creative_title: 'Hello',
    });
  });

  it('should raise FlattenError when two action fields produce the same key', () => {
    const record: InsightRecord = {
      actions: [{ action_type: 'value_purchase', value: '1' }],
      action_values: [{ action_type: 'purchase', value: '20' }],
    };

    let thrown: unknown;
    try {
      flattenActions(record);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(FlattenError);
    expect(thrown).toMatchObject({
      field: 'action_values',
      message: 'Key "action_value_purchase" from field "action_values" collides with field "actions"',
    });
  });

  it('should raise FlattenError when a flattened key collides with a plain field', () => {
    const record: InsightRecord = {
      action_purchase: '4',
      actions: [{ action_type: 'purchase', value: '1' }],
    };

    expect(() => flattenActions(record)).toThrow(
      'Key "action_purchase" from field "actions" collides with field "action_purchase"'
    );
  });

  it('should not modify its input', () => {
    const record: InsightRecord = { actions: [{ action_type: 'lead', value: '1' }] };

    flattenActions(record);

    expect(record).toEqual({ actions: [{ action_type: 'lead', value: '1' }] });
  });
});

describe('coerceNumericFields', () => {
  it('should convert numeric strings of metric fields only', () => {
    const result = coerceNumericFields({
      campaign_name: 'Sale 2024',
      spend: '12.50',
      impressions: '1000',
      ctr: 'n/a',
      date_start: '2024-01-01',
      action_purchase: 5,
    });

    expect(result).toEqual({
      campaign_name: 'Sale 2024',
      spend: 12.5,
      impressions: 1000,
      ctr: 'n/a',
      date_start: '2024-01-01',
      action_purchase: 5,
    });
  });
});

import React from 'react';
import {
  DOSE_SLOTS,
  DOSE_VALUES,
  EXERCISE_KINDS,
  EXERCISE_NAMES,
  type DoseEvent,
  type DoseSlot,
  type JournalRecord,
} from '../../../src/journal/record';
import './JournalForm.css';

interface JournalFormProps {
  record: JournalRecord;
  disabled?: boolean;
  onChange: (record: JournalRecord) => void;
}

const SLOT_TITLES: Record<DoseSlot, string> = {
  morning: 'Morning dose',
  midday: 'Midday dose',
  afternoon: 'Afternoon dose',
};

const SCORE_OPTIONS = Array.from({ length: 11 }, (_, index) => index);

const toInputValue = (value: string | number | null): string => (value === null ? '' : String(value));

const toOptionalText = (value: string): string | null => (value.trim() ? value : null);

const toScore = (value: string): number | null => {
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed >= 0 && parsed <= 10 ? parsed : null;
};

const toCount = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 0;
};

const JournalForm: React.FC<JournalFormProps> = ({ record, disabled = false, onChange }) => {
  const updateDose = (index: number, patch: Partial<Omit<DoseEvent, 'slot'>>) => {
    const doses: JournalRecord['doses'] = [...record.doses];
    doses[index] = { ...doses[index], ...patch };
    onChange({ ...record, doses });
  };

  const updateSleep = (patch: Partial<JournalRecord['sleep']>) => {
    onChange({ ...record, sleep: { ...record.sleep, ...patch } });
  };

  const updateWork = (patch: Partial<JournalRecord['work']>) => {
    onChange({ ...record, work: { ...record.work, ...patch } });
  };

  const updateExercise = (patch: Partial<JournalRecord['exercise']>) => {
    onChange({ ...record, exercise: { ...record.exercise, ...patch } });
  };

  const updateDayRating = (patch: Partial<JournalRecord['dayRating']>) => {
    onChange({ ...record, dayRating: { ...record.dayRating, ...patch } });
  };

  return (
    <fieldset className="journal-form" disabled={disabled}>
      <section className="journal-form__section">
        <h3>Sleep</h3>
        <label>
          Bedtime
          <input
            type="time"
            value={toInputValue(record.sleep.bedtime)}
            onChange={(event) => updateSleep({ bedtime: toOptionalText(event.target.value) })}
          />
        </label>
        <label>
          Duration
          <input
            type="text"
            placeholder="7h30"
            value={toInputValue(record.sleep.duration)}
            onChange={(event) => updateSleep({ duration: toOptionalText(event.target.value) })}
          />
        </label>
      </section>

      {DOSE_SLOTS.map((slot, index) => {
        const dose = record.doses[index];
        return (
          <section key={slot} className="journal-form__section">
            <h3>{SLOT_TITLES[slot]}</h3>
            <label>
              Time
              <input
                type="time"
                value={toInputValue(dose.time)}
                onChange={(event) => updateDose(index, { time: toOptionalText(event.target.value) })}
              />
            </label>
            <label>
              Dose
              <select
                value={toInputValue(dose.doseMg)}
                onChange={(event) =>
                  updateDose(index, { doseMg: DOSE_VALUES.find((value) => String(value) === event.target.value) ?? null })
                }
              >
                <option value="">—</option>
                {DOSE_VALUES.map((value) => (
                  <option key={value} value={value}>
                    {value} mg
                  </option>
                ))}
              </select>
            </label>
            <label>
              Efficacy
              <select
                value={toInputValue(dose.efficacy)}
                onChange={(event) => updateDose(index, { efficacy: toScore(event.target.value) })}
              >
                <option value="">—</option>
                {SCORE_OPTIONS.map((score) => (
                  <option key={score} value={score}>
                    {score}
                  </option>
                ))}
              </select>
            </label>
            <label className="journal-form__wide">
              Note
              <input
                type="text"
                value={dose.note}
                onChange={(event) => updateDose(index, { note: event.target.value })}
              />
            </label>
            <label className="journal-form__wide">
              Side effects
              <input
                type="text"
                value={dose.sideEffects}
                onChange={(event) => updateDose(index, { sideEffects: event.target.value })}
              />
            </label>
          </section>
        );
      })}

      <section className="journal-form__section">
        <h3>Work</h3>
        <label>
          Start
          <input
            type="time"
            value={toInputValue(record.work.start)}
            onChange={(event) => updateWork({ start: toOptionalText(event.target.value) })}
          />
        </label>
        <label>
          Lunch break
          <input
            type="time"
            value={toInputValue(record.work.lunchBreakStart)}
            onChange={(event) => updateWork({ lunchBreakStart: toOptionalText(event.target.value) })}
          />
        </label>
        <label className="journal-form__checkbox">
          <input
            type="checkbox"
            checked={record.work.workedAfternoon}
            onChange={(event) => updateWork({ workedAfternoon: event.target.checked })}
          />
          Worked in the afternoon
        </label>
        {record.work.workedAfternoon && (
          <>
            <label>
              Resumed at
              <input
                type="time"
                value={toInputValue(record.work.afternoonResume)}
                onChange={(event) => updateWork({ afternoonResume: toOptionalText(event.target.value) })}
              />
            </label>
            <label>
              End
              <input
                type="time"
                value={toInputValue(record.work.end)}
                onChange={(event) => updateWork({ end: toOptionalText(event.target.value) })}
              />
            </label>
          </>
        )}
        <label>
          Patients
          <input
            type="number"
            min={0}
            value={record.work.patientsTotal}
            onChange={(event) => updateWork({ patientsTotal: toCount(event.target.value) })}
          />
        </label>
        <label>
          New patients
          <input
            type="number"
            min={0}
            value={record.work.patientsNew}
            onChange={(event) => updateWork({ patientsNew: toCount(event.target.value) })}
          />
        </label>
      </section>

      <section className="journal-form__section">
        <h3>Exercise</h3>
        <label className="journal-form__checkbox">
          <input
            type="checkbox"
            checked={record.exercise.done}
            onChange={(event) => updateExercise({ done: event.target.checked })}
          />
          Exercised today
        </label>
        {record.exercise.done && (
          <>
            <label>
              Kind
              <select
                value={toInputValue(record.exercise.kind)}
                onChange={(event) =>
                  updateExercise({ kind: EXERCISE_KINDS.find((kind) => kind === event.target.value) ?? null })
                }
              >
                <option value="">—</option>
                {EXERCISE_KINDS.map((kind) => (
                  <option key={kind} value={kind}>
                    {EXERCISE_NAMES[kind]}
                  </option>
                ))}
              </select>
            </label>
            <label>
              Start
              <input
                type="time"
                value={toInputValue(record.exercise.start)}
                onChange={(event) => updateExercise({ start: toOptionalText(event.target.value) })}
              />
            </label>
            <label>
              Duration
              <input
                type="text"
                placeholder="45min"
                value={toInputValue(record.exercise.duration)}
                onChange={(event) => updateExercise({ duration: toOptionalText(event.target.value) })}
              />
            </label>
          </>
        )}
      </section>

      <section className="journal-form__section">
        <h3>Day</h3>
        <label>
          Difficulty
          <select
            value={toInputValue(record.dayRating.difficulty)}
            onChange={(event) => updateDayRating({ difficulty: toScore(event.target.value) })}
          >
            <option value="">—</option>
            {SCORE_OPTIONS.map((score) => (
              <option key={score} value={score}>
                {score}/10
              </option>
            ))}
          </select>
        </label>
        <label className="journal-form__wide">
          Comment
          <textarea
            rows={3}
            value={record.dayRating.comment}
            onChange={(event) => updateDayRating({ comment: event.target.value })}
          />
        </label>
      </section>
    </fieldset>
  );
};

export default JournalForm;

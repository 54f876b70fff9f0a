import type {
  Evaluation,
  FilterCriteria,
  JoinedRecord,
  Message,
  RecordId,
} from '../types/recordTypes.js';

// Ids may arrive as numbers from one table and strings from the other
function joinKey(id: RecordId): string {
  return String(id);
}

export function indexEvaluations(evaluations: Evaluation[]): Map<string, Evaluation[]> {
  const index = new Map<string, Evaluation[]>();

  for (const evaluation of evaluations) {
    const key = joinKey(evaluation.message_id);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(evaluation);
    } else {
      index.set(key, [evaluation]);
    }
  }

  return index;
}

// Left join on message.id == evaluation.message_id. Every evaluation of a
// message yields its own record; message order is kept.
export function joinRecords(messages: Message[], evaluations: Evaluation[]): JoinedRecord[] {
  const index = indexEvaluations(evaluations);

  return messages.flatMap<JoinedRecord>((message) => {
    const matches = index.get(joinKey(message.id));
    if (!matches) {
      return [{ message, evaluation: null }];
    }
    return matches.map((evaluation) => ({ message, evaluation }));
  });
}

// Inner join, for callers that only want evaluated messages
export function innerJoinRecords(messages: Message[], evaluations: Evaluation[]): JoinedRecord[] {
  return joinRecords(messages, evaluations).filter((record) => record.evaluation !== null);
}

function containsText(value: string | null, needle: string): boolean {
  return value !== null && value.toLowerCase().includes(needle);
}

export function matchesCriteria(record: JoinedRecord, criteria: FilterCriteria): boolean {
  const { message, evaluation } = record;

  if (criteria.search) {
    const needle = criteria.search.toLowerCase();
    if (!containsText(message.question, needle) && !containsText(message.response, needle)) {
      return false;
    }
  }

  if (criteria.questionType && evaluation?.question_type !== criteria.questionType) {
    return false;
  }

  if (criteria.complexity && evaluation?.question_complexity !== criteria.complexity) {
    return false;
  }

  if (criteria.highRiskOnly && evaluation?.is_high_risk_topic !== true) {
    return false;
  }

  return true;
}

export function filterRecords(records: JoinedRecord[], criteria: FilterCriteria = {}): JoinedRecord[] {
  return records.filter((record) => matchesCriteria(record, criteria));
}

export function joinAndFilter(
  messages: Message[],
  evaluations: Evaluation[],
  criteria: FilterCriteria = {}
): JoinedRecord[] {
  return filterRecords(joinRecords(messages, evaluations), criteria);
}

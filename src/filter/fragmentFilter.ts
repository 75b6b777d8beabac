import { ParseError } from "../core/errors";
import { parseTripFileName } from "../discovery/fragment";
import { Fragment, SelectionCriteria, TripFileIdentity } from "../types";

export interface UnparsedFragment {
  fragment: Fragment;
  error: ParseError;
}

export interface FragmentSelection {
  selected: Fragment[];
  rejected: Fragment[];
  unparsed: UnparsedFragment[];
}

export function matchesCriteria(identity: TripFileIdentity, criteria: SelectionCriteria): boolean {
  return (
    identity.recordType === criteria.recordType &&
    identity.year === criteria.year &&
    criteria.months.has(identity.month)
  );
}

/** Throws ParseError when the fragment's name does not follow the trip file grammar. */
export function isAllowed(fragment: Fragment, criteria: SelectionCriteria): boolean {
  return matchesCriteria(parseTripFileName(fragment.name), criteria);
}

export function selectFragments(fragments: readonly Fragment[], criteria: SelectionCriteria): FragmentSelection {
  const selection: FragmentSelection = { selected: [], rejected: [], unparsed: [] };

  for (const fragment of fragments) {
    let allowed: boolean;
    try {
      allowed = isAllowed(fragment, criteria);
    } catch (error) {
      if (error instanceof ParseError) {
        selection.unparsed.push({ fragment, error });
        continue;
      }
      throw error;
    }

    if (allowed) {
      selection.selected.push(fragment);
    } else {
      selection.rejected.push(fragment);
    }
  }

  return selection;
}

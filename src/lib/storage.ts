const LABELER_KEY = "annotator_labeler_v1";

export function loadLabelerPreference(): string | null {
  if (typeof window === "undefined") {
    return null;
  }

  const raw = window.localStorage.getItem(LABELER_KEY);
  return raw ? raw : null;
}

export function saveLabelerPreference(labelerId: string | null) {
  if (typeof window === "undefined") {
    return;
  }

  if (labelerId) {
    window.localStorage.setItem(LABELER_KEY, labelerId);
  } else {
    window.localStorage.removeItem(LABELER_KEY);
  }
}

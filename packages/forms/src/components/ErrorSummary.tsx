"use client";

import { AlertCircle, AlertTriangle, X } from "lucide-react";

import { cn } from "../utils/cn";

type MessageMap = Readonly<Record<string, string | undefined>>;

export interface ErrorSummaryProps {
  errors: MessageMap;
  warnings?: MessageMap;
  /** Display names for field keys */
  labels?: Readonly<Record<string, string>>;
  title?: string;
  onDismiss?: () => void;
  className?: string;
}

function presentEntries(messages: MessageMap): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const [field, message] of Object.entries(messages)) {
    if (message) entries.push([field, message]);
  }
  return entries;
}

export function ErrorSummary({
  errors,
  warnings = {},
  labels = {},
  title = "Please fix the following",
  onDismiss,
  className,
}: ErrorSummaryProps) {
  const errorEntries = presentEntries(errors);
  const warningEntries = presentEntries(warnings);

  if (errorEntries.length === 0 && warningEntries.length === 0) {
    return null;
  }

  return (
    <div className={cn("space-y-3", className)}>
      {errorEntries.length > 0 && (
        <div role="alert" className="rounded-md border border-destructive/50 bg-destructive/10 p-4">
          <div className="flex items-start justify-between gap-4">
            <div className="flex items-start gap-3">
              <AlertCircle className="w-5 h-5 text-destructive flex-shrink-0 mt-0.5" aria-hidden="true" />
              <div>
                <h4 className="font-medium text-destructive mb-2">
                  {title} ({errorEntries.length})
                </h4>
                <ul className="space-y-1">
                  {errorEntries.map(([field, message]) => (
                    <li key={field} className="text-sm text-destructive/90">
                      <span className="font-medium">{labels[field] ?? field}:</span> {message}
                    </li>
                  ))}
                </ul>
              </div>
            </div>
            {onDismiss && (
              <button
                type="button"
                onClick={onDismiss}
                aria-label="Dismiss errors"
                className="p-1 rounded hover:bg-destructive/20 transition-colors"
              >
                <X className="w-4 h-4 text-destructive" aria-hidden="true" />
              </button>
            )}
          </div>
        </div>
      )}

      {warningEntries.length > 0 && (
        <div className="rounded-md border border-warning/50 bg-warning/10 p-4">
          <div className="flex items-start gap-3">
            <AlertTriangle className="w-5 h-5 text-warning flex-shrink-0 mt-0.5" aria-hidden="true" />
            <ul className="space-y-1">
              {warningEntries.map(([field, message]) => (
                <li key={field} className="text-sm text-warning">
                  <span className="font-medium">{labels[field] ?? field}:</span> {message}
                </li>
              ))}
            </ul>
          </div>
        </div>
      )}
    </div>
  );
}

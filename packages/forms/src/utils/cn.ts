import { clsx, type ClassValue } from "clsx";
import { twMerge } from "tailwind-merge";

/**
 * Merge Tailwind CSS classes with clsx
 * Later classes win over conflicting earlier ones
 */
export function cn(...inputs: ClassValue[]): string {
  return twMerge(clsx(inputs));
}

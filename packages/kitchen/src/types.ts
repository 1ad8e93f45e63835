/**
 * Cooking step derived from a recipe. Immutable once planned.
 */
export interface CookingStep {
  /** 1-based position in the plan */
  index: number;
  instruction: string;
  durationMinutes: number;
}

/**
 * `stopped` marks an operator-initiated stop; `completed` is reserved for
 * sessions that ran every step.
 */
export type SessionStatus = 'starting' | 'cooking' | 'completed' | 'stopped';

export interface CookingSession {
  id: string;
  recipeName: string;
  steps: CookingStep[];
  /** 0 = not started, steps.length = last step reached */
  currentStepIndex: number;
  status: SessionStatus;
  timeRemainingSeconds: number;
  createdAt: string;
  startedAt?: string;
  endedAt?: string;
}

export interface SessionSnapshot {
  id: string;
  recipeName: string;
  status: SessionStatus;
  currentStepIndex: number;
  totalSteps: number;
  timeRemainingSeconds: number;
  currentInstruction: string | null;
}

export interface HistoryEntry {
  id: string;
  recipeName: string;
  status: 'completed' | 'stopped';
  startedAt: string | null;
  endedAt: string | null;
  totalMinutes: number;
  stepsCompleted: number;
}

export interface StartCookingRequest {
  recipeName: string;
  estimatedMinutes?: number;
  /** Free-text recipe; when absent the appliance demo plan is used */
  instructions?: string;
  /** Caller-chosen id; generated when absent */
  sessionId?: string;
  /** Ingredient names; estimate the total time from them when `estimatedMinutes` is absent */
  ingredients?: string[];
  /** Cooking method for that estimate (default: pressure) */
  method?: string;
}

export interface StartCookingResult {
  sessionId: string;
  recipeName: string;
  totalSteps: number;
  estimatedMinutes: number;
  currentInstruction: string;
}

// ---------------------------------------------------------------------------
// Appliances
// ---------------------------------------------------------------------------

export type ApplianceType = 'OVEN' | 'AUTOCOOKER' | 'SPEAKER';
export type OvenStatus = 'idle' | 'preheating' | 'ready';
export type PressureCookerStatus =
  | 'idle'
  | 'pressurizing'
  | 'pressure_cooking'
  | 'depressurizing'
  | 'ready';

interface ApplianceBase {
  id: string;
  name: string;
  brand: string;
  isConnected: boolean;
  features: string[];
  lastUpdate: string;
}

export interface OvenState extends ApplianceBase {
  type: 'OVEN';
  status: OvenStatus;
  /** Degrees Celsius */
  currentMeasurement: number;
  targetMeasurement: number;
  unit: 'C';
  mode: string;
}

export interface PressureCookerState extends ApplianceBase {
  type: 'AUTOCOOKER';
  status: PressureCookerStatus;
  /** PSI */
  currentMeasurement: number;
  targetMeasurement: number;
  unit: 'PSI';
  holdMinutes: number;
}

export interface SpeakerState extends ApplianceBase {
  type: 'SPEAKER';
  status: 'online';
}

export type ApplianceState = OvenState | PressureCookerState | SpeakerState;

export interface DeviceSummary {
  id: string;
  name: string;
  type: ApplianceType;
  brand: string;
  status: string;
  isConnected: boolean;
  features: string[];
}

export interface PreheatRequest {
  temperature: number;
  mode?: string;
}

export interface PreheatResult {
  message: string;
  estimatedMinutes: number;
}

export interface PressureCookRequest {
  pressure: number;
  /** Minutes at pressure */
  duration: number;
}

export interface PressureCookResult {
  message: string;
  totalMinutes: number;
}

export interface SelfTestReport {
  success: boolean;
  message: string;
  results: Record<string, {
    name: string;
    connected: boolean;
    status: string;
    lastUpdate: string;
    testPassed: boolean;
  }>;
}

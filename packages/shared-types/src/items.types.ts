import type { PrType } from './github.types.js';

// Events a client sends back when a secondary action fires
export type ItemEvent =
    | { type: 'multiselect'; prType: PrType; prUrl: string }
    | { type: 'approved-prs' };

export type ItemAction =
    | { kind: 'open'; urls: string[] }
    | { kind: 'emit'; event: ItemEvent }
    | { kind: 'none' };

export type IconVariant = 'normal' | 'own' | 'approved' | 'own-approved' | 'error';

export interface DisplayItem {
    title: string;
    subtitle: string;
    iconVariant: IconVariant;
    primaryAction: ItemAction;
    secondaryAction?: ItemAction;
}

export interface ItemsResponse {
    items: DisplayItem[];
}

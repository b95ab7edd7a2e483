import type { PlanRecord } from '../../types';

const formatArea = (value: number) => value.toLocaleString('en-US');

// "Aspen - Premium | 1,400 SF | 3BR/2.5BA | 2 Story"
export function formatPlanSummary(record: PlanRecord): string {
    return `${record.planName} - ${record.specLevel} | ${formatArea(record.livingArea)} SF | ${record.bedrooms}BR/${record.bathrooms}BA | ${record.stories} Story`;
}

export function formatPlanDetails(record: PlanRecord): string {
    return [
        `Plan: ${record.planName} (${record.specLevel})`,
        `Client: ${record.clientName}`,
        `Division: ${record.clientDivision}`,
        `Subdivision: ${record.clientSubdivision}`,
        `Garage Loading: ${record.garageLoading || '-'}`,
        `Dimensions: ${record.overallWidth} W x ${record.overallDepth} D`,
        `Stories: ${record.stories}`,
        `Bed/Bath: ${record.bedrooms} / ${record.bathrooms}`,
        `Garage Bays: ${record.garageBays}`,
        `Living Area: ${formatArea(record.livingArea)} SF`,
        `Total Area: ${formatArea(record.totalArea)} SF`,
    ].join('\n');
}

/**
 * @fileoverview Map Presenter Service
 *
 * Turns the reshaped table into point markers for a map renderer: one GeoJSON
 * feature per location with a short hover label and an HTML click popup.
 */

import { Injectable } from '@nestjs/common';
import type { Feature, FeatureCollection, Point } from 'geojson';
import { LocationPasses, PassTime } from './interfaces';

export interface MarkerProperties {
    location_id: string;
    display_name: string;
    /** `<name>, <id>: <soonest pass>` */
    hover: string;
    /** Heading plus up to three numbered pass lines. */
    popup: string;
    first: PassTime | null;
    second: PassTime | null;
    third: PassTime | null;
}

export type PassesFeatureCollection = FeatureCollection<Point, MarkerProperties>;

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

@Injectable()
export class MapPresenterService {
    toFeatureCollection(passes: readonly LocationPasses[]): PassesFeatureCollection {
        return {
            type: 'FeatureCollection',
            features: passes.map((location) => this.toFeature(location)),
        };
    }

    /**
     * Reshaped reports never carry a row without a first pass, but the
     * presenter takes any LocationPasses list, so an empty row still gets a label.
     */
    hoverText(location: LocationPasses): string {
        const soonest = location.first?.display ?? 'no upcoming pass';
        return `${location.display_name}, ${location.location_id}: ${soonest}`;
    }

    popupHtml(location: LocationPasses): string {
        const heading = `<b>${escapeHtml(location.display_name)}, ${escapeHtml(location.location_id)}</b>`;
        const lines = [location.first, location.second, location.third]
            .map((pass, index) => (pass ? `${index + 1}. ${escapeHtml(pass.display)}` : null))
            .filter((line): line is string => line !== null);

        return [heading, ...lines].join('<br>');
    }

    private toFeature(location: LocationPasses): Feature<Point, MarkerProperties> {
        return {
            type: 'Feature',
            geometry: {
                type: 'Point',
                // GeoJSON positions are [longitude, latitude]
                coordinates: [location.longitude, location.latitude],
            },
            properties: {
                location_id: location.location_id,
                display_name: location.display_name,
                hover: this.hoverText(location),
                popup: this.popupHtml(location),
                first: location.first,
                second: location.second,
                third: location.third,
            },
        };
    }
}

import { LocationPasses } from './interfaces';
import { MapPresenterService } from './map-presenter.service';
import { formatPassTime } from './reshaper';

describe('MapPresenterService', () => {
    let presenter: MapPresenterService;

    const sacramento: LocationPasses = {
        location_id: 'CA',
        display_name: 'Sacramento',
        latitude: 38.58,
        longitude: -121.49,
        first: formatPassTime(1700000000),
        second: formatPassTime(1700003600),
        third: formatPassTime(1700007200),
    };

    beforeEach(() => {
        presenter = new MapPresenterService();
    });

    describe('toFeatureCollection', () => {
        it('should place one point per location at [longitude, latitude]', () => {
            const collection = presenter.toFeatureCollection([sacramento]);

            expect(collection.type).toBe('FeatureCollection');
            expect(collection.features).toHaveLength(1);
            expect(collection.features[0].geometry).toEqual({ type: 'Point', coordinates: [-121.49, 38.58] });
        });

        it('should carry labels and pass times as properties', () => {
            const [feature] = presenter.toFeatureCollection([sacramento]).features;

            expect(feature.properties).toEqual({
                location_id: 'CA',
                display_name: 'Sacramento',
                hover: 'Sacramento, CA: 2023-11-14 22:13:20 UTC',
                popup: '<b>Sacramento, CA</b><br>1. 2023-11-14 22:13:20 UTC'
                    + '<br>2. 2023-11-14 23:13:20 UTC<br>3. 2023-11-15 00:13:20 UTC',
                first: sacramento.first,
                second: sacramento.second,
                third: sacramento.third,
            });
        });

        it('should keep the table order', () => {
            const austin = { ...sacramento, location_id: 'TX', display_name: 'Austin' };

            const ids = presenter.toFeatureCollection([austin, sacramento]).features
                .map((feature) => feature.properties.location_id);

            expect(ids).toEqual(['TX', 'CA']);
        });
    });

    describe('popupHtml', () => {
        it('should list only the passes that exist', () => {
            const popup = presenter.popupHtml({ ...sacramento, second: null, third: null });

            expect(popup).toBe('<b>Sacramento, CA</b><br>1. 2023-11-14 22:13:20 UTC');
        });

        it('should escape markup in names', () => {
            const popup = presenter.popupHtml({ ...sacramento, display_name: 'Fort <Knox> & "Co"', second: null, third: null });

            expect(popup).toBe('<b>Fort &lt;Knox&gt; &amp; &quot;Co&quot;, CA</b><br>1. 2023-11-14 22:13:20 UTC');
        });
    });

    describe('hoverText', () => {
        it('should fall back when there is no pass', () => {
            expect(presenter.hoverText({ ...sacramento, first: null })).toBe('Sacramento, CA: no upcoming pass');
        });
    });
});

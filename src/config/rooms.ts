import { gameConfig } from 'config/game';
import type { RoomTemplate } from 'game/rooms';

const WIDTH = gameConfig.world.width;
const GROUND_Y = gameConfig.world.groundY;

export const roomTemplates: readonly RoomTemplate[] = [
    {
        id: 'thorn-meadow',
        platforms: [[0, GROUND_Y, WIDTH, 50], [190, 430, 170, 20], [450, 360, 180, 20]],
        seasonalPlatforms: [
            { rect: [330, 300, 130, 16], seasons: ['spring', 'autumn'], kind: 'vine' },
            { rect: [690, 270, 170, 16], seasons: ['winter'], kind: 'ice' },
        ],
        hazards: [[560, GROUND_Y - 18, 130, 18]],
        water: [[95, GROUND_Y - 18, 180, 18]],
        wind: [[640, 210, 200, 220]],
        exit: [900, GROUND_Y - 70, 44, 70],
    },
    {
        id: 'high-canopy',
        platforms: [[0, GROUND_Y, WIDTH, 50], [160, 390, 120, 20], [350, 330, 140, 20], [560, 285, 120, 20]],
        seasonalPlatforms: [
            { rect: [285, 445, 110, 16], seasons: ['winter'], kind: 'ice' },
            { rect: [725, 250, 145, 16], seasons: ['spring', 'autumn'], kind: 'vine' },
        ],
        hazards: [[380, GROUND_Y - 18, 120, 18]],
        water: [[640, GROUND_Y - 20, 210, 20]],
        wind: [[95, 220, 180, 230]],
        exit: [902, 180, 40, 68],
    },
    {
        id: 'return-hollow',
        platforms: [[0, GROUND_Y, WIDTH, 50], [105, 455, 160, 20], [360, 415, 160, 20], [620, 360, 150, 20]],
        seasonalPlatforms: [
            { rect: [500, 300, 130, 16], seasons: ['spring', 'autumn'], kind: 'vine' },
            { rect: [260, 310, 130, 16], seasons: ['winter'], kind: 'ice' },
        ],
        hazards: [[140, GROUND_Y - 16, 135, 16], [810, GROUND_Y - 16, 90, 16]],
        water: [[430, GROUND_Y - 18, 200, 18]],
        wind: [[700, 210, 160, 210]],
        exit: [34, 380, 38, 70],
    },
];
